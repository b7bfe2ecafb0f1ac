import { join } from 'node:path';
import { mkdirSync, readFileSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Command } from 'commander';
import { AdaptedResponseSchema } from '@domain/types/request.js';
import { registerAdaptCommand } from './adapt.js';

const QUERY = 'Input: cat Output: CAT\nInput: dog Output: DOG\nInput: owl Output:';

describe('registerAdaptCommand', () => {
  let baseDir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    baseDir = join(tmpdir(), `primer-adapt-test-${randomUUID()}`);
    mkdirSync(baseDir, { recursive: true });
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function createProgram(): Command {
    const program = new Command();
    program.option('--json').option('--verbose').option('--cwd <path>');
    program.exitOverride();
    registerAdaptCommand(program);
    return program;
  }

  it('generates with the preview model and reports the adaptation status', async () => {
    await createProgram().parseAsync(['node', 'test', '--json', '--cwd', baseDir, 'adapt', QUERY]);

    const response = AdaptedResponseSchema.parse(JSON.parse(String(consoleSpy.mock.calls[0]?.[0])));
    expect(response.text.startsWith('--- Query ---\n')).toBe(true);
    expect(typeof response.adaptation.enabled).toBe('boolean');
  });

  it('skips adaptation with --no-adapt', async () => {
    await createProgram().parseAsync(['node', 'test', '--json', '--cwd', baseDir, 'adapt', QUERY, '--no-adapt']);

    const response = AdaptedResponseSchema.parse(JSON.parse(String(consoleSpy.mock.calls[0]?.[0])));
    expect(response.adaptation).toEqual({ enabled: false, confidence: null, reason: 'Disabled' });
    expect(response.text.endsWith('  none (base generation)')).toBe(true);
  });

  it('records metrics only in an initialised project', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'adapt', QUERY, '--no-adapt']);
    expect(existsSync(join(baseDir, '.primer'))).toBe(false);

    mkdirSync(join(baseDir, '.primer'));
    await createProgram().parseAsync([
      'node', 'test', '--cwd', baseDir, 'adapt', QUERY, '--no-adapt', '--request-id', 'req-cli',
    ]);

    const log = readFileSync(join(baseDir, '.primer', 'metrics', 'adaptation.jsonl'), 'utf-8');
    expect(log.trim().split('\n')).toHaveLength(1);
    expect(log).toContain('"requestId":"req-cli"');
    expect(log).toContain('"rejectionReason":"Disabled"');
  });

  it('fails the command for an unknown model', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'adapt', QUERY, '--model', 'missing']);

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error: Unknown base model: "missing". Valid models are: preview, command',
    );
  });
});
