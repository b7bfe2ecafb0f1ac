import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerDetectCommand } from './commands/detect.js';
import { registerAdaptCommand } from './commands/adapt.js';
import { registerMetricsCommand } from './commands/metrics.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('primer')
    .description('Inference-time task adaptation: learn from the examples in a query before answering it')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--cwd <path>', 'Set working directory');

  // Wire --verbose / --json to the logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    setLoggerOptions({ level: opts['verbose'] ? 'debug' : 'info', json: !!opts['json'] });
  });

  registerInitCommand(program);
  registerDetectCommand(program);
  registerAdaptCommand(program);
  registerMetricsCommand(program);

  return program;
}
