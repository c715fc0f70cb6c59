export * from './types';
export * from './walker';
