export * from './defaults';
export * from './pathFilter';
