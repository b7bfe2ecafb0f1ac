import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Command } from 'commander';
import { registerInitCommand } from './init.js';

describe('registerInitCommand', () => {
  let baseDir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    baseDir = join(tmpdir(), `primer-init-test-${randomUUID()}`);
    mkdirSync(baseDir, { recursive: true });
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
    consoleSpy.mockRestore();
  });

  function createProgram(): Command {
    const program = new Command();
    program.option('--json').option('--verbose').option('--cwd <path>');
    program.exitOverride();
    registerInitCommand(program);
    return program;
  }

  it('creates .primer/config.json and the metrics directory', async () => {
    await createProgram().parseAsync(['node', 'test', '--json', '--cwd', baseDir, 'init']);

    const output: unknown = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({
      primerDir: join(baseDir, '.primer'),
      configPath: join(baseDir, '.primer', 'config.json'),
      written: true,
    });
    expect(existsSync(join(baseDir, '.primer', 'metrics'))).toBe(true);
    expect(readFileSync(join(baseDir, '.primer', 'config.json'), 'utf-8')).toContain('"confidenceThreshold": 0.7');
  });

  it('keeps an existing config unless --force is given', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'init']);
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'init']);

    expect(consoleSpy).toHaveBeenLastCalledWith(
      `primer already initialized; kept ${join(baseDir, '.primer', 'config.json')} (use --force to reset)`,
    );

    await createProgram().parseAsync(['node', 'test', '--json', '--cwd', baseDir, 'init', '--force']);
    expect(consoleSpy.mock.calls.at(-1)?.[0]).toContain('"written": true');
  });
});
