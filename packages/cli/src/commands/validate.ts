import { Command } from 'commander';
import path from 'path';
import { ConfigLoader } from '@repairbench/core';
import { ScenarioStore } from '@repairbench/corpus';
import { UsageError } from '@repairbench/shared';
import type { GlobalOptions } from '../flags';
import { OutputRenderer } from '../output/renderer';
import { printCorpusCounts } from '../output/table';

export function registerValidateCommand(program: Command) {
  program
    .command('validate')
    .description('Load a corpus, report problems and print scenario counts')
    .option('--corpus <path>', 'Directory of scenario manifests')
    .action(async (options: { corpus?: string }) => {
      const globalOpts = program.opts<GlobalOptions>();
      const output = new OutputRenderer(!!globalOpts.json);

      const corpus = options.corpus
        ? path.resolve(options.corpus)
        : ConfigLoader.load({ configPath: globalOpts.config }).corpus;
      if (!corpus) {
        throw new UsageError('No corpus given. Pass --corpus <path> or set corpus in the config file.');
      }

      const store = await ScenarioStore.load(corpus);
      const counts = store.counts();

      if (output.json) {
        output.data({ corpus, scenarios: store.size, ...counts });
        return;
      }
      output.log(`Corpus ${corpus}: ${store.size} scenarios`);
      printCorpusCounts(counts);
    });
}
