/**
 * Remote file naming.
 *
 * Files land in the configured directory under their own base name, with an
 * optional UTC timestamp before the extension: data.csv -> /out/data_20240105123000.csv
 */

import * as path from 'path';
import { formatUtcTimestamp } from './DateFormat.js';

export const DEFAULT_APPEND_DATE_FORMAT = '%Y%m%d%H%M%S';

export interface DestinationParameters {
  path: string;
  append_date?: boolean;
  append_date_format?: string;
}

export function ensureTrailingSlash(dir: string): string {
  return dir.endsWith('/') ? dir : `${dir}/`;
}

export function buildDestinationPath(
  destination: DestinationParameters,
  fileName: string,
  now: Date = new Date()
): string {
  const baseName = path.basename(fileName);
  const extension = path.extname(baseName);
  const stem = baseName.slice(0, baseName.length - extension.length);

  let suffix = '';
  if (destination.append_date) {
    const pattern = destination.append_date_format || DEFAULT_APPEND_DATE_FORMAT;
    suffix = `_${formatUtcTimestamp(pattern, now)}`;
  }

  return `${ensureTrailingSlash(destination.path)}${stem}${suffix}${extension}`;
}
