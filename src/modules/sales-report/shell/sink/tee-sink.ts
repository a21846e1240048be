import fs from 'node:fs';

import { err, ok, type Result } from 'neverthrow';

import { errorMessage } from '../../../../common/types/errors.js';
import { createOutputUnavailableError, type OutputUnavailableError } from '../../core/errors.js';

import type { ReportSink } from '../../core/ports.js';

export interface TeeSinkOptions {
  /** Output artifact, truncated when the sink opens */
  filePath: string;
  /** Console writer; defaults to console.log */
  writeLine?: (line: string) => void;
}

export interface FileReportSink extends ReportSink {
  /** Releases the output file. Further emits throw. */
  close(): void;
}

/**
 * Opens the output file once and mirrors every emitted line to it and to the
 * console.
 */
export const createTeeSink = (
  options: TeeSinkOptions
): Result<FileReportSink, OutputUnavailableError> => {
  const writeLine =
    options.writeLine ??
    ((line: string) => {
      console.log(line);
    });

  let fd: number;
  try {
    fd = fs.openSync(options.filePath, 'w');
  } catch (error) {
    return err(createOutputUnavailableError(options.filePath, errorMessage(error)));
  }

  let closed = false;

  return ok({
    emit(line: string): void {
      if (closed) {
        throw new Error(`Report sink for ${options.filePath} is closed`);
      }
      writeLine(line);
      fs.writeSync(fd, `${line}\n`);
    },

    close(): void {
      if (closed) {
        return;
      }
      closed = true;
      fs.closeSync(fd);
    },
  });
};

/**
 * Runs `work` with an open sink and always closes it afterwards.
 */
export const withTeeSink = <T>(
  options: TeeSinkOptions,
  work: (sink: ReportSink) => T
): Result<T, OutputUnavailableError> =>
  createTeeSink(options).map((sink) => {
    try {
      return work(sink);
    } finally {
      sink.close();
    }
  });
