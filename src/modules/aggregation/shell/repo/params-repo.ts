import fs from 'node:fs/promises';

import { err, type Result } from 'neverthrow';

import { toErrorMessage } from '@/common/types/errors.js';

import { createConfigurationError, type ConfigurationError } from '../../core/errors.js';
import { parseRunParams } from '../../core/run-config.js';

import type { RunConfig, RunLocations } from '../../core/types.js';

/**
 * Reads the JSON params file and validates it.
 */
export async function loadRunParams(
  filePath: string
): Promise<Result<{ config: RunConfig; locations: RunLocations }, ConfigurationError>> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err(createConfigurationError(`Params file not found at ${filePath}`));
    }
    return err(
      createConfigurationError(`Failed to read params at ${filePath}: ${toErrorMessage(error)}`)
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const message = `Failed to parse params JSON at ${filePath}: ${toErrorMessage(error)}`;
    return err(createConfigurationError(message));
  }

  return parseRunParams(raw);
}
