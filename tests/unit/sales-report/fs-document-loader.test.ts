import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createFsDocumentLoader } from '@/modules/sales-report/index.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'sales-loader-'));
};

describe('fs document loader', () => {
  it('parses a JSON file', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'prices.json');
    await writeFile(filePath, '[{"title":"Widget","price":10}]', 'utf8');

    const result = createFsDocumentLoader().load(filePath);

    expect(result._unsafeUnwrap()).toEqual([{ title: 'Widget', price: 10 }]);
  });

  it('reports a missing file as NotFound', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'missing.json');

    const error = createFsDocumentLoader().load(filePath)._unsafeUnwrapErr();

    expect(error).toEqual({ type: 'NotFound', message: 'file not found', path: filePath });
  });

  it('reports malformed JSON as ParseError', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'broken.json');
    await writeFile(filePath, '[{"Product": "Widget",', 'utf8');

    const error = createFsDocumentLoader().load(filePath)._unsafeUnwrapErr();

    expect(error.type).toBe('ParseError');
    expect(error.path).toBe(filePath);
    expect(error.message.startsWith('invalid JSON: ')).toBe(true);
  });

  it('reports a directory as ReadError', async () => {
    const dir = await makeTempDir();

    const error = createFsDocumentLoader().load(dir)._unsafeUnwrapErr();

    expect(error.type).toBe('ReadError');
  });
});
