export * from './classifier';
export * from './fileTypes';
