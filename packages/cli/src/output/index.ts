export { printTable, type TableRow } from './table';
export { OutputRenderer, describeDependency } from './renderer';
export type { CommandResult, RendererOptions } from './renderer';
