/**
 * Dataset store tests (temp directory)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DatasetStore } from '../../src/integrations/datasets/dataset-store.js';
import { NotFoundError, ValidationError } from '../../src/errors/index.js';

const CSV = 'region,sales\nnorth,10\nsouth,12\n';
const digestOf = (text: string) => createHash('sha256').update(text).digest('hex');

describe('DatasetStore', () => {
  let dir: string;
  let store: DatasetStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'insightflow-datasets-'));
    store = new DatasetStore({ dir, maxFileBytes: 1024, allowedExtensions: ['.csv', '.json'] });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stores an upload under its content digest', async () => {
    const stored = await store.put('uploads/Sales.CSV', new TextEncoder().encode(CSV));
    const digest = digestOf(CSV);

    expect(stored.ref).toEqual({
      id: digest,
      digest,
      path: join(dir, `${digest}.csv`),
      fileName: 'Sales.CSV',
      sizeBytes: CSV.length,
    });
    expect(stored.summary.rowCount).toBe(2);
    expect(await readFile(stored.ref.path, 'utf-8')).toBe(CSV);
    expect((await readdir(dir)).sort()).toEqual([`${digest}.csv`, `${digest}.meta.json`]);
  });

  it('returns the first upload for identical content', async () => {
    const first = await store.put('a.csv', new TextEncoder().encode(CSV));
    const second = await store.put('b.csv', new TextEncoder().encode(CSV));

    expect(second.ref).toEqual(first.ref);
    expect(second.uploadedAt).toBe(first.uploadedAt);
  });

  it('reads a stored dataset back by id', async () => {
    const stored = await store.put('a.csv', new TextEncoder().encode(CSV));
    expect(await store.get(stored.ref.id)).toEqual(stored);
  });

  it.each([
    { name: 'notes.txt', body: 'hello', message: 'Unsupported file type ".txt"; allowed: .csv, .json' },
    { name: 'empty.csv', body: '', message: 'Uploaded file is empty' },
    { name: 'big.csv', body: 'x'.repeat(1025), message: 'File exceeds 1024 bytes' },
  ])('rejects $name', async ({ name, body, message }) => {
    const error = await store.put(name, new TextEncoder().encode(body)).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message, fields: ['file'] });
  });

  it('does not find unknown or malformed ids', async () => {
    await expect(store.get('../etc/passwd')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.get('a'.repeat(64))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('treats corrupt metadata as missing', async () => {
    const stored = await store.put('a.csv', new TextEncoder().encode(CSV));
    await writeFile(join(dir, `${stored.ref.digest}.meta.json`), '{"fileName": 3}');

    await expect(store.get(stored.ref.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
