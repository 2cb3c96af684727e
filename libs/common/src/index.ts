export * from './clock';
export * from './constants';
export * from './errors';
export * from './money';
export * from './transformers';
export * from './utils';
