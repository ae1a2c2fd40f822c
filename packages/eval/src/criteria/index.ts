export { file_contains, lookupFile } from './file_contains';
export type { FileLookup } from './file_contains';
export { script_exit } from './script_exit';
export { expected_output } from './expected_output';
export type { CriterionEvaluator, CriterionInput, CriterionResult } from './types';
