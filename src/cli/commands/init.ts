import { join } from 'node:path';
import type { Command } from 'commander';
import { writeDefaultConfig } from '@infra/config/config-loader.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { PRIMER_DIRS } from '@shared/constants/paths.js';
import { withCommandContext } from '@cli/utils.js';

/**
 * Register the `primer init` command: create .primer/ with a default config.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .primer/ with a config file holding every default')
    .option('--force', 'Overwrite an existing config.json')
    .action(withCommandContext((ctx) => {
      const force = ctx.cmd.opts()['force'] === true;

      JsonStore.ensureDir(join(ctx.primerDir, PRIMER_DIRS.metrics));
      const result = writeDefaultConfig(ctx.primerDir, force);

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ primerDir: ctx.primerDir, configPath: result.path, written: result.written }, null, 2));
        return;
      }

      if (result.written) {
        console.log(`✓ primer initialized at ${ctx.primerDir}`);
        console.log(`  Config: ${result.path}`);
      } else {
        console.log(`primer already initialized; kept ${result.path} (use --force to reset)`);
      }
    }, { needsPrimerDir: false }));
}
