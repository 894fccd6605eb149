import { promises as fsp } from 'fs';
import yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import { JsonObject } from '../types/index.js';
import { isRecord } from './objects.js';

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Parses a YAML document that must be a mapping. An empty document is an empty mapping. */
export function parseYamlMapping(text: string, filePath: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = yaml.load(text, { filename: filePath });
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a YAML mapping`, { filePath });
  }
  return parsed;
}

/** Reads and parses a YAML mapping; resolves to null when the file does not exist. */
export async function readYamlMapping(filePath: string): Promise<JsonObject | null> {
  let text: string;
  try {
    text = await fsp.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
  return parseYamlMapping(text, filePath);
}
