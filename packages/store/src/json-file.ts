import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { StoreCorruptedError } from './errors.js';
import type { DocumentStore } from './types.js';

export interface JsonFileDocumentStoreOptions<T> {
  path: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Document returned when the file does not exist yet. */
  empty: () => T;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export class JsonFileDocumentStore<T> implements DocumentStore<T> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly empty: () => T;

  constructor(options: JsonFileDocumentStoreOptions<T>) {
    this.path = options.path;
    this.schema = options.schema;
    this.empty = options.empty;
  }

  async read(): Promise<T> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return this.empty();
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new StoreCorruptedError(this.path, error instanceof Error ? error.message : String(error));
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      throw new StoreCorruptedError(this.path, describeIssues(parsed.error));
    }

    return parsed.data;
  }

  /** Temp file + rename, so readers never see a half-written document. */
  async write(document: T): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;

    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
