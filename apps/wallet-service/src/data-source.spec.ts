import { createDataSourceOptions } from './data-source';

describe('createDataSourceOptions', () => {
  it('should fall back to local defaults', () => {
    const options = createDataSourceOptions(() => undefined);

    expect(options).toMatchObject({
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      username: 'wallet_user',
      database: 'wallet_db',
      synchronize: false,
    });
  });

  it('should read the connection from the environment', () => {
    const env: Record<string, string> = {
      WALLET_DB_HOST: 'db.internal',
      WALLET_DB_PORT: '6543',
      WALLET_DB_USER: 'ledger',
      WALLET_DB_PASSWORD: 'test-secret',
      WALLET_DB_NAME: 'ledger_test',
      WALLET_DB_SYNCHRONIZE: 'true',
    };

    const options = createDataSourceOptions((key) => env[key]);

    expect(options).toMatchObject({
      host: 'db.internal',
      port: 6543,
      username: 'ledger',
      password: 'test-secret',
      database: 'ledger_test',
      synchronize: true,
    });
  });

  it('should register the user, wallet and transaction tables', () => {
    const { entities } = createDataSourceOptions(() => undefined);

    expect(Array.isArray(entities) ? entities.length : 0).toBe(3);
  });
});
