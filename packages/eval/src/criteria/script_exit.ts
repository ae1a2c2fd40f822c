import type { CriterionEvaluator } from './types';

interface ScriptExitDetails {
  expectedExitCode: number;
}

export const script_exit: CriterionEvaluator<ScriptExitDetails> = ({ result }, details) => {
  const passed = result.exitCode === details.expectedExitCode;
  const observed = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
  return {
    passed,
    message: passed
      ? `verification exited with expected code ${details.expectedExitCode}`
      : `verification exited with ${observed}, expected ${details.expectedExitCode}`,
  };
};
