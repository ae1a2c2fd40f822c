import { Command } from 'commander';
import { version } from '../package.json';
import { registerRunCommand } from './commands/run';
import { registerValidateCommand } from './commands/validate';
import type { CliState } from './state';

export function createProgram(state: CliState): Command {
  const program = new Command();

  program
    .name('repairbench')
    .description('Benchmark harness for automated program-repair agents')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Throw instead of exiting so the caller decides the exit code.
    .exitOverride();

  registerRunCommand(program, state);
  registerValidateCommand(program);

  return program;
}
