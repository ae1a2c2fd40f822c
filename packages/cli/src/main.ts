import { CommanderError } from 'commander';
import { AppError, isUserCorrectable } from '@repairbench/shared';
import { createProgram } from './program';
import type { CliState } from './state';

/**
 * Parses `argv`, runs the selected command and returns the process exit code:
 * 0 on success, 2 for corpus, config and usage errors, 1 for anything else.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const state: CliState = { exitCode: 0 };
  const program = createProgram(state);

  try {
    await program.parseAsync([...argv]);
    return state.exitCode;
  } catch (e: unknown) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the usage error.
      return e.exitCode === 0 ? 0 : 2;
    }

    const opts = program.opts<{ json?: boolean; verbose?: boolean }>();
    if (opts.json) {
      console.log(
        JSON.stringify({
          error:
            e instanceof AppError
              ? { code: e.code, message: e.message, details: e.details }
              : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) },
        }),
      );
    } else {
      console.error(`Error: ${(e instanceof Error && e.message) || String(e)}`);
      if (e instanceof AppError && e.details) {
        console.error(
          `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
        );
      }
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      } else if (!isUserCorrectable(e)) {
        console.error(`\nFor more details, run with the --verbose flag.`);
      }
    }

    return isUserCorrectable(e) ? 2 : 1;
  }
}
