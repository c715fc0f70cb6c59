export const name = '@gitsift/shared';

export * from './errors';
export * from './logger';
export * from './config';
export * from './fs/path';
export * from './fs/io';
