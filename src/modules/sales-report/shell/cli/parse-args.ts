import { err, ok, type Result } from 'neverthrow';

import { createUsageError, type UsageError } from '../../core/errors.js';

import type { ReportMode } from '../../core/types.js';

export const USAGE =
  'Usage: compute-sales [--summary] [--output <file>] <priceCatalogue.json> <salesRecord.json> [<salesRecord2.json> ...]';

export const INCORRECT_USAGE_MESSAGE =
  'Incorrect usage. Please provide a price catalogue and at least one sales record JSON file.';

export interface CliOptions {
  cataloguePath: string;
  salesPaths: string[];
  /** Set only when a mode flag was given */
  mode?: ReportMode;
  outputPath?: string;
}

/**
 * Parse command line arguments (without the node and script entries).
 */
export const parseArgs = (args: readonly string[]): Result<CliOptions, UsageError> => {
  const positional: string[] = [];
  let mode: ReportMode | undefined;
  let outputPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    switch (arg) {
      case '--summary':
        mode = 'summary';
        break;
      case '--detailed':
        mode = 'detailed';
        break;
      case '--output': {
        const next = args[i + 1];
        if (next === undefined || next.startsWith('--')) {
          return err(createUsageError('--output requires a file path'));
        }
        outputPath = next;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          return err(createUsageError(`Unknown option: ${arg}`));
        }
        positional.push(arg);
    }
  }

  const [cataloguePath, ...salesPaths] = positional;
  if (cataloguePath === undefined || salesPaths.length === 0) {
    return err(createUsageError(INCORRECT_USAGE_MESSAGE));
  }

  return ok({
    cataloguePath,
    salesPaths,
    ...(mode !== undefined && { mode }),
    ...(outputPath !== undefined && { outputPath }),
  });
};
