export * from './types';
export * from './version';
export * from './pep508';
export { requirementsTxtParser, parseVcsUrl, isDevManifest, logicalLines } from './requirements';
export { pyprojectParser, parsePyproject } from './pyproject';
export { packageJsonParser, parsePackageJson } from './packageJson';
export * from './registry';
