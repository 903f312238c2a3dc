/**
 * Schema Loader
 *
 * Reads the schema documents shipped in component_config/ and checks them.
 * Documents are cached per file path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaDocumentError, errorMessage } from '../errors/ComponentErrors.js';
import { getLogger } from '../logging/LoggerFactory.js';
import { SchemaDocument, parseSchemaDocument } from './SchemaDocument.js';

export type SchemaKind = 'config' | 'row';

export const SCHEMA_FILE_NAMES: Record<SchemaKind, string> = {
  config: 'configSchema.json',
  row: 'configRowSchema.json',
};

const COMPONENT_CONFIG_DIR = 'component_config';

const logger = getLogger('schema-loader');
const cache = new Map<string, SchemaDocument>();

/**
 * Walk up from `startDir` to the first directory holding component_config/.
 * Works from both src/ and the compiled dist/src/.
 */
export function findComponentConfigDir(startDir: string = __dirname): string {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, COMPONENT_CONFIG_DIR);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new SchemaDocumentError(
        `No ${COMPONENT_CONFIG_DIR} directory found above ${startDir}`,
        startDir
      );
    }
    current = parent;
  }
}

/**
 * Read and check one schema document file.
 */
export function loadSchemaFile(filePath: string): SchemaDocument {
  const resolved = path.resolve(filePath);
  const cached = cache.get(resolved);
  if (cached) return cached;

  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new SchemaDocumentError(
      `Failed to read schema document ${resolved}: ${errorMessage(error)}`,
      resolved,
      [],
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SchemaDocumentError(
      `Schema document ${resolved} is not valid JSON: ${errorMessage(error)}`,
      resolved,
      [],
      { cause: error }
    );
  }

  const document = parseSchemaDocument(raw, resolved);
  logger.debug(`Loaded ${path.basename(resolved)}`, {
    properties: Object.keys(document.properties).length,
  });
  cache.set(resolved, document);
  return document;
}

/**
 * Load the connection ('config') or destination ('row') schema document.
 * @param dir - directory holding the documents, defaults to component_config/
 */
export function loadSchemaDocument(kind: SchemaKind, dir?: string): SchemaDocument {
  const baseDir = dir ?? findComponentConfigDir();
  return loadSchemaFile(path.join(baseDir, SCHEMA_FILE_NAMES[kind]));
}

/**
 * Clear cached documents (for testing)
 */
export function resetSchemaCache(): void {
  cache.clear();
}
