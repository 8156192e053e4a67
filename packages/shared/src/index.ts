export * from './types/email';
export * from './types/load';
export * from './utils/format';
