import type { ExecutionResult, FileTree, Scenario } from '@repairbench/shared';

/**
 * Everything a criterion may look at once execution has finished.
 */
export interface CriterionInput {
  scenario: Scenario;
  /** Scenario tree with the patch applied */
  patchedTree: FileTree;
  result: ExecutionResult;
}

export interface CriterionResult {
  passed: boolean;
  message: string;
  /** Set when the descriptor itself could not be evaluated cleanly */
  warning?: string;
}

export type CriterionEvaluator<D> = (input: CriterionInput, details: D) => CriterionResult;
