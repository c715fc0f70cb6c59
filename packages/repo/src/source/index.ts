export * from './fetcher';
export * from './cleanup';
