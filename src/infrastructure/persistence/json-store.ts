import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod/v4';
import { PrimerError } from '@shared/lib/errors.js';

export class JsonStoreError extends PrimerError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'JsonStoreError';
  }
}

/**
 * Typed JSON file persistence, validated with Zod on both read and write.
 */
export const JsonStore = {
  /**
   * Read a JSON file and validate against schema.
   * @throws JsonStoreError if file missing, invalid JSON, or validation fails
   */
  read<T>(path: string, schema: z.ZodType<T>): T {
    if (!existsSync(path)) {
      throw new JsonStoreError(`File not found: ${path}`, path);
    }

    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new JsonStoreError(`Failed to read file: ${path}`, path, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new JsonStoreError(`Invalid JSON in file: ${path}`, path, err);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new JsonStoreError(`Validation failed for ${path}: ${issues}`, path, result.error);
    }

    return result.data;
  },

  /**
   * Like read(), but a missing file yields the schema's parse of `{}`.
   */
  readOrDefault<T>(path: string, schema: z.ZodType<T>): T {
    if (!existsSync(path)) {
      return schema.parse({});
    }
    return JsonStore.read(path, schema);
  },

  /**
   * Validate data and write to JSON file.
   * Creates parent directories if they don't exist.
   */
  write<T>(path: string, data: T, schema: z.ZodType<T>): void {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new JsonStoreError(
        `Validation failed before write: ${JSON.stringify(result.error.issues, null, 2)}`,
        path,
        result.error,
      );
    }

    JsonStore.ensureDir(dirname(path));

    try {
      writeFileSync(path, JSON.stringify(result.data, null, 2) + '\n', 'utf-8');
    } catch (err) {
      throw new JsonStoreError(`Failed to write file: ${path}`, path, err);
    }
  },

  exists(path: string): boolean {
    return existsSync(path);
  },

  /** Create directory and all parents if they don't exist */
  ensureDir(dir: string): void {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  },
};
