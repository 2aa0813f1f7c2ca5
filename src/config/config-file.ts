/**
 * JSON5 configuration files (feed definitions, feed reader routes)
 */

import { readFile } from 'node:fs/promises';
import JSON5 from 'json5';
import type { z } from 'zod';
import { parseConfig } from './crawler-config';
import { InvalidConfigurationError, errorMessage } from '../utils/errors';

/**
 * Read, parse and validate a JSON5 file.
 * @throws InvalidConfigurationError when the file is unreadable, is not
 * JSON5, or fails validation
 */
export async function loadConfigFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new InvalidConfigurationError([`${path}: cannot read file: ${errorMessage(error)}`]);
  }

  let data: unknown;
  try {
    data = JSON5.parse(raw);
  } catch (error) {
    throw new InvalidConfigurationError([`${path}: ${errorMessage(error)}`]);
  }

  return parseConfig(schema, data);
}
