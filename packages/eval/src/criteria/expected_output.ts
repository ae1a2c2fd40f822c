import type { CriterionEvaluator } from './types';

interface ExpectedOutputDetails {
  expected: string;
}

export const expected_output: CriterionEvaluator<ExpectedOutputDetails> = ({ result }, details) => {
  if (result.stdout.includes(details.expected)) {
    return { passed: true, message: 'stdout contains expected output' };
  }
  const message = result.stdoutTruncated
    ? 'expected output missing (stdout was truncated)'
    : 'expected output missing';
  return { passed: false, message };
};
