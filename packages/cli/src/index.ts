export const name = '@repairbench/cli';

export { runCli } from './main';
export { createProgram } from './program';
export type { CliState } from './state';
export { printTable, printRunSummary, printCorpusCounts } from './output/table';
export { OutputRenderer } from './output/renderer';
export { toConfigFlags } from './flags';
export type { GlobalOptions, RunFlags } from './flags';
