export const name = '@gitsift/repo';

export * from './filter';
export * from './classify';
export * from './scanner';
export * from './tree';
export * from './stats';
export * from './deps';
export * from './git';
export * from './source';
export * from './repository';
export * from './functions';
