/**
 * Snapshot of a project: relative POSIX path -> file content.
 */
export type FileTree = Readonly<Record<string, string>>;

/**
 * "File X must contain Y" - evaluated against post-patch file content,
 * independent of the verification command's exit code.
 */
export interface StructuralExpectedFix {
  kind: 'structural';
  /** Path (or unique path suffix) of the file that must contain the substring */
  file: string;
  requiredSubstring: string;
}

/**
 * "The verification command must exit 0" (optionally printing a given output).
 */
export interface BehavioralExpectedFix {
  kind: 'behavioral';
  verificationCommand: string;
  /** Substring stdout must contain for the fix to count as correct */
  expectedOutput?: string;
  /** Files where a correct fix is expected; used for localization only */
  locations?: string[];
}

export type ExpectedFix = StructuralExpectedFix | BehavioralExpectedFix;

export interface Scenario {
  readonly id: string;
  readonly source: string;
  readonly category: string;
  readonly difficulty: string;
  readonly files: FileTree;
  readonly symptom: string;
  readonly expectedFix: Readonly<ExpectedFix>;
  readonly verificationCommand: string;
  /** Manifest the scenario was loaded from */
  readonly manifestPath: string;
}

/**
 * Locations named by a descriptor, used for localization scoring.
 */
export function expectedLocations(fix: ExpectedFix): string[] {
  return fix.kind === 'structural' ? [fix.file] : (fix.locations ?? []);
}
