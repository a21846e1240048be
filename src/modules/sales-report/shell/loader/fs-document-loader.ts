import fs from 'node:fs';

import { err, ok, type Result } from 'neverthrow';

import { errorMessage } from '../../../../common/types/errors.js';

import type { LoadError } from '../../core/errors.js';
import type { DocumentLoader } from '../../core/ports.js';

const readDocument = (filePath: string): Result<unknown, LoadError> => {
  let contents: string;

  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return err({ type: 'NotFound', message: 'file not found', path: filePath });
    }

    return err({
      type: 'ReadError',
      message: `failed to read file: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    const parsed: unknown = JSON.parse(contents);
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `invalid JSON: ${errorMessage(error)}`,
      path: filePath,
    });
  }
};

/**
 * Loads JSON documents from the local filesystem, synchronously.
 */
export const createFsDocumentLoader = (): DocumentLoader => ({
  load: readDocument,
});
