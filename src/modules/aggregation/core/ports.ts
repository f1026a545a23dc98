import type { OutputWriteError } from './errors.js';
import type { ExportFile } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Destination for finished aggregates.
 *
 * Implementations must be all-or-nothing: when `write` fails, no file of the
 * batch may be left in the destination.
 */
export interface OutputWriter {
  /**
   * Persists every export file of a run.
   * @returns Paths of the files now present in the destination
   */
  write(files: readonly ExportFile[]): Promise<Result<string[], OutputWriteError>>;
}
