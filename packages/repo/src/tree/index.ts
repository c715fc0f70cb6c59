export * from './formatter';
