/**
 * Configuration Loader
 *
 * Loads YAML cluster configuration files from the filesystem and dumps
 * resolved documents back to YAML.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigLoadError } from '../core/errors.js';

/**
 * A parsed configuration file together with its original text.
 */
export interface LoadedDocument {
  document: unknown;
  text: string;
  filePath: string;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Parse YAML text.
 *
 * @param content - YAML text
 * @param source - Name used in error messages
 * @throws ConfigLoadError (CONFIG_INVALID_YAML) on a syntax error
 */
export function parseYaml(content: string, source: string): unknown {
  try {
    return yaml.load(content);
  } catch (error) {
    const detail = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigLoadError(`Invalid YAML syntax in ${source}: ${detail}`, 'CONFIG_INVALID_YAML', source, {
      cause: error,
    });
  }
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content (requires validation) and the file text
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<LoadedDocument> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, 'CONFIG_NOT_FOUND', filePath, {
        cause: error,
      });
    }
    if (code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        'CONFIG_NOT_FOUND',
        filePath,
        { cause: error }
      );
    }
    throw new ConfigLoadError(`Failed to read configuration file: ${filePath}`, 'CONFIG_NOT_FOUND', filePath, {
      cause: error,
    });
  }

  return { document: parseYaml(content, filePath), text: content, filePath };
}

/**
 * Serialize a document to YAML, keys in document order.
 */
export function dumpYaml(document: unknown): string {
  return yaml.dump(document, { noRefs: true, lineWidth: 120 });
}
