import { ValidationPipe, type INestApplication } from '@nestjs/common';
import { LedgerExceptionFilter } from './interface/http/ledger-exception.filter';

/**
 * Global pipes and filters shared by the server bootstrap and the e2e tests.
 */
export function configureHttpApp(app: INestApplication): INestApplication {
  // Request validation (input): Validates incoming JSON against DTO decorators
  // - whitelist: strips properties without decorators
  // - forbidNonWhitelisted: rejects requests with extra properties
  // - transform: auto-converts JSON to DTO class instances
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new LedgerExceptionFilter());
  return app;
}
