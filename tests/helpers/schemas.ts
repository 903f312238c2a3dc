import * as fs from 'fs';
import * as path from 'path';

export const COMPONENT_CONFIG_DIR = path.resolve(__dirname, '..', '..', 'component_config');

/**
 * Parse a shipped schema document straight from disk
 */
export function readShippedSchema(fileName: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(COMPONENT_CONFIG_DIR, fileName), 'utf8'));
}
