/**
 * Mutable outcome of one CLI invocation, shared between the program and its
 * commands.
 */
export interface CliState {
  exitCode: number;
}
