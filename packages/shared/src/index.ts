export * from './errors';
export * from './utils';
export * from './validation';
