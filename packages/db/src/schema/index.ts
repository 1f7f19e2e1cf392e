export * from './hotel';
