/**
 * Dataset Store
 *
 * Content-addressed upload storage. A dataset's id is the sha256 of its
 * bytes, so uploading the same file twice yields the same id and the same
 * file on disk. Each dataset sits at `<dir>/<digest><ext>` with a
 * `<digest>.meta.json` sidecar holding its original name and summary.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import type { UploadConfig } from '../../config/schema.js';
import { NotFoundError, ValidationError, toError } from '../../errors/index.js';
import type { DatasetRef, DatasetSummary } from '../orchestration/types.js';
import { createComponentLogger } from '../utilities/logger.js';
import { summarizeDataset } from './summarizer.js';

const log = createComponentLogger('DatasetStore');

const DIGEST_PATTERN = /^[a-f0-9]{64}$/;

const ColumnSchema = z.object({
  name: z.string(),
  type: z.enum(['number', 'boolean', 'date', 'string', 'empty']),
  missing: z.number(),
  samples: z.array(z.string()),
});

const MetaSchema = z.object({
  fileName: z.string(),
  extension: z.string(),
  sizeBytes: z.number(),
  uploadedAt: z.string(),
  summary: z.object({
    fileName: z.string(),
    format: z.enum(['delimited', 'json', 'text']),
    rowCount: z.number(),
    columns: z.array(ColumnSchema),
  }),
});

type DatasetMeta = z.infer<typeof MetaSchema>;

export interface StoredDataset {
  ref: DatasetRef;
  summary: DatasetSummary;
  uploadedAt: string;
}

export interface DatasetStoreConfig extends UploadConfig {
  dir: string;
}

export class DatasetStore {
  constructor(private readonly config: DatasetStoreConfig) {}

  /**
   * Validate, summarize and persist an upload.
   *
   * @throws ValidationError on an empty or oversized file, or a disallowed extension
   */
  async put(fileName: string, bytes: Uint8Array): Promise<StoredDataset> {
    const name = basename(fileName);
    const extension = extname(name).toLowerCase();

    if (!this.config.allowedExtensions.includes(extension)) {
      throw new ValidationError(
        `Unsupported file type "${extension || name}"; allowed: ${this.config.allowedExtensions.join(', ')}`,
        ['file'],
      );
    }
    if (bytes.byteLength === 0) {
      throw new ValidationError('Uploaded file is empty', ['file']);
    }
    if (bytes.byteLength > this.config.maxFileBytes) {
      throw new ValidationError(`File exceeds ${this.config.maxFileBytes} bytes`, ['file'], {
        sizeBytes: bytes.byteLength,
      });
    }

    const digest = createHash('sha256').update(bytes).digest('hex');
    const existing = await this.readMeta(digest);
    if (existing) {
      log.debug('Dataset already stored', { digest });
      return this.toStored(digest, existing);
    }

    const meta: DatasetMeta = {
      fileName: name,
      extension,
      sizeBytes: bytes.byteLength,
      uploadedAt: new Date().toISOString(),
      summary: summarizeDataset(bytes, name),
    };

    await mkdir(this.config.dir, { recursive: true });
    await writeFile(this.dataPath(digest, extension), bytes);
    await writeFile(this.metaPath(digest), JSON.stringify(meta, null, 2));
    log.info('Dataset stored', { digest, fileName: name, sizeBytes: meta.sizeBytes, rows: meta.summary.rowCount });

    return this.toStored(digest, meta);
  }

  /**
   * @throws NotFoundError when no dataset has this id
   */
  async get(id: string): Promise<StoredDataset> {
    const meta = DIGEST_PATTERN.test(id) ? await this.readMeta(id) : null;
    if (!meta) {
      throw new NotFoundError('Dataset', id);
    }
    return this.toStored(id, meta);
  }

  private toStored(digest: string, meta: DatasetMeta): StoredDataset {
    return {
      ref: {
        id: digest,
        digest,
        path: this.dataPath(digest, meta.extension),
        fileName: meta.fileName,
        sizeBytes: meta.sizeBytes,
      },
      summary: meta.summary,
      uploadedAt: meta.uploadedAt,
    };
  }

  private async readMeta(digest: string): Promise<DatasetMeta | null> {
    let raw: string;
    try {
      raw = await readFile(this.metaPath(digest), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw toError(error);
    }

    const parsed = MetaSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      log.warn('Ignoring corrupt dataset metadata', { digest });
      return null;
    }

    try {
      await stat(this.dataPath(digest, parsed.data.extension));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw toError(error);
    }
    return parsed.data;
  }

  private dataPath(digest: string, extension: string): string {
    return join(this.config.dir, `${digest}${extension}`);
  }

  private metaPath(digest: string): string {
    return join(this.config.dir, `${digest}.meta.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
