export * from './extraction';
export * from './loader';
