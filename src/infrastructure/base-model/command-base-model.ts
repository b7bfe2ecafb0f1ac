import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { writeFileSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Adapter } from '@domain/types/adapter.js';
import type { TaskContext } from '@domain/types/request.js';
import type { IBaseModel } from '@domain/ports/base-model.js';
import { encodeAdapterWeights } from '@features/adaptation/adapter-codec.js';
import { logger } from '@shared/lib/logger.js';

const execFileAsync = promisify(execFile);

export interface CommandExecOptions {
  cwd: string;
  timeout: number;
  maxBuffer: number;
  encoding: 'utf-8';
  env: NodeJS.ProcessEnv;
  /** Kills the child when the request is cancelled */
  signal?: AbortSignal;
}

export type CommandExec = (
  file: string,
  args: readonly string[],
  options: CommandExecOptions,
) => Promise<{ stdout: string; stderr: string }>;

export interface CommandBaseModelOptions {
  /** Binary to spawn. */
  command: string;
  /** Leading arguments; the query is appended as the last one. */
  args?: readonly string[];
  /** Working directory for the child. Defaults to process.cwd(). */
  cwd?: string;
  /** Defaults to 120,000 ms. */
  timeoutMs?: number;
}

/** Environment variables handed to the child when an adapter is attached. */
export const ADAPTER_ENV = {
  path: 'PRIMER_ADAPTER_PATH',
  id: 'PRIMER_ADAPTER_ID',
  confidence: 'PRIMER_ADAPTER_CONFIDENCE',
} as const;

/**
 * Check if a binary exists on the system PATH.
 * Exported for testing purposes.
 */
export async function checkBinaryExists(binaryPath: string): Promise<boolean> {
  try {
    await execFileAsync('which', [binaryPath]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Base model backed by an external program.
 *
 * The query is passed as the final argument and stdout is the response. When
 * an adapter is attached its weights are written to a temp file for the
 * duration of the call and the path is exported as PRIMER_ADAPTER_PATH; the
 * file is removed when the call ends.
 */
export class CommandBaseModel implements IBaseModel {
  readonly name = 'command';

  private readonly command: string;
  private readonly args: readonly string[];
  private readonly cwd: string;
  private readonly timeoutMs: number;

  // Injection points for testing
  private _checkBinary: (path: string) => Promise<boolean>;
  private _execFile: CommandExec;
  private _writeFile: (path: string, content: Buffer) => void;
  private _deleteFile: (path: string) => void;

  constructor(options: CommandBaseModelOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.cwd = options.cwd ?? process.cwd();
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this._checkBinary = checkBinaryExists;
    this._execFile = (file, args, execOptions) => execFileAsync(file, args, execOptions);
    this._writeFile = (path, content) => writeFileSync(path, content);
    this._deleteFile = (path) => unlinkSync(path);
  }

  /** Replace the binary existence check (for testing). */
  setBinaryChecker(checker: (path: string) => Promise<boolean>): void {
    this._checkBinary = checker;
  }

  /** Replace the exec function (for testing). */
  setExecFunction(execFn: CommandExec): void {
    this._execFile = execFn;
  }

  /** Replace file write (for testing). */
  setFileWriter(fn: (path: string, content: Buffer) => void): void {
    this._writeFile = fn;
  }

  /** Replace file delete (for testing). */
  setFileDeleter(fn: (path: string) => void): void {
    this._deleteFile = fn;
  }

  async generate(context: TaskContext, adapter?: Adapter, signal?: AbortSignal): Promise<string> {
    if (!(await this._checkBinary(this.command))) {
      throw new Error(`Base model binary not found: "${this.command}". Set baseModel.command or use the "preview" model.`);
    }

    const env: NodeJS.ProcessEnv = { ...process.env };
    const adapterPath = adapter ? join(tmpdir(), `primer-adapter-${adapter.id}.bin`) : null;

    try {
      if (adapter && adapterPath) {
        this._writeFile(adapterPath, encodeAdapterWeights(adapter.weights));
        env[ADAPTER_ENV.path] = adapterPath;
        env[ADAPTER_ENV.id] = adapter.id;
        env[ADAPTER_ENV.confidence] = adapter.confidenceScore.toFixed(4);
      }

      const { stdout, stderr } = await this._execFile(this.command, [...this.args, context.query], {
        cwd: this.cwd,
        timeout: this.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf-8',
        env,
        ...(signal ? { signal } : {}),
      });
      if (stderr.trim()) {
        logger.debug('Base model wrote to stderr', { command: this.command, stderr: stderr.trim() });
      }
      return stdout.trim();
    } finally {
      if (adapterPath) this.removeAdapterFile(adapterPath);
    }
  }

  private removeAdapterFile(path: string): void {
    try {
      this._deleteFile(path);
    } catch (err) {
      logger.warn('Could not remove adapter file', {
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
