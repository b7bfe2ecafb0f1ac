import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { Command } from 'commander';
import type { FrozenAdaptationConfig } from '@domain/types/config.js';
import { AdaptationConfigSchema } from '@domain/types/config.js';
import { ConfigNotFoundError } from '@shared/lib/errors.js';
import { PRIMER_DIRS } from '@shared/constants/paths.js';
import { freezeConfig, loadAdaptationConfig } from '@infra/config/config-loader.js';

/**
 * Resolve the .primer/ directory path from a given cwd (or process.cwd()).
 * Throws ConfigNotFoundError if the directory does not exist.
 */
export function resolvePrimerDir(cwd?: string): string {
  const dir = primerDirFor(cwd);
  if (!existsSync(dir)) {
    throw new ConfigNotFoundError(dir);
  }
  return dir;
}

/** The .primer/ path for a cwd, whether or not it exists. */
export function primerDirFor(cwd?: string): string {
  return join(cwd ?? process.cwd(), PRIMER_DIRS.root);
}

/**
 * The project's config when initialised, the built-in defaults otherwise.
 */
export function loadConfigOrDefaults(primerDir: string): FrozenAdaptationConfig {
  return existsSync(primerDir)
    ? loadAdaptationConfig(primerDir)
    : freezeConfig(AdaptationConfigSchema.parse({}));
}

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  cwd?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  /** Path of .primer/; may not exist when the command runs without one */
  primerDir: string;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext, ...args: string[]) => void | Promise<void>;

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  const cwd: unknown = opts['cwd'];
  return {
    json: !!opts['json'],
    verbose: !!opts['verbose'],
    cwd: typeof cwd === 'string' ? cwd : undefined,
  };
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * resolves the .primer/ directory, extracts global options, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper strips the last two, passes cmd via context, and forwards the
 * string positional args.
 */
export function withCommandContext(
  handler: CommandHandler,
  options?: { needsPrimerDir?: boolean },
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new Error('withCommandContext: handler must be bound with .action()');
    }
    const positionalArgs = args.slice(0, -2).filter((a): a is string => typeof a === 'string');
    const globalOpts = getGlobalOptions(cmd);

    try {
      const primerDir = options?.needsPrimerDir === false
        ? primerDirFor(globalOpts.cwd)
        : resolvePrimerDir(globalOpts.cwd);

      await handler({ globalOpts, primerDir, cmd }, ...positionalArgs);
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
