export * from './languages';
export * from './repository';
