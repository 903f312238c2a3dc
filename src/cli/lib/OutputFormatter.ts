/**
 * Output Formatter
 *
 * Table and JSON rendering for CLI commands.
 */

import chalk from 'chalk';
import type { FormField } from '../../forms/FormFields.js';
import type { SchemaDocument } from '../../schema/SchemaDocument.js';

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

// =============================================================================
// Table Formatting
// =============================================================================

export interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

export interface TableOptions {
  columns: TableColumn[];
  border?: boolean;
}

/**
 * Create a simple ASCII table
 */
export function createTable(data: string[][], options: TableOptions): string {
  const { columns, border = true } = options;
  const lines: string[] = [];

  const widths = columns.map((col, i) => {
    const maxDataWidth = Math.max(0, ...data.map((row) => (row[i] ?? '').length));
    return Math.max(col.width, col.header.length, maxDataWidth);
  });

  const v = border ? '│' : ' ';
  const renderRow = (cells: string[]): string => {
    const row = columns
      .map((col, i) => pad(cells[i] ?? '', widths[i] ?? 0, col.align))
      .map((cell) => (border ? ` ${cell} ` : cell))
      .join(v);
    return border ? v + row + v : row;
  };
  const rule = (left: string, mid: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right;

  if (border) lines.push(rule('┌', '┬', '┐'));
  lines.push(renderRow(columns.map((col) => col.header)));
  lines.push(border ? rule('├', '┼', '┤') : widths.map((w) => '-'.repeat(w)).join(' '));
  for (const row of data) {
    lines.push(renderRow(row));
  }
  if (border) lines.push(rule('└', '┴', '┘'));

  return lines.join('\n');
}

// =============================================================================
// Specific Formatters
// =============================================================================

function formatDefault(value: FormField['defaultValue']): string {
  return value === undefined ? '' : JSON.stringify(value);
}

/**
 * Form fields in render order
 */
export function formatFieldTable(fields: readonly FormField[], border = true): string {
  const columns: TableColumn[] = [
    { header: 'Order', width: 5, align: 'right' },
    { header: 'Key', width: 10 },
    { header: 'Title', width: 10 },
    { header: 'Widget', width: 8 },
    { header: 'Required', width: 8 },
    { header: 'Secret', width: 6 },
    { header: 'Default', width: 7 },
  ];
  const rows = fields.map((field) => [
    field.propertyOrder === undefined ? '' : String(field.propertyOrder),
    field.key,
    field.title,
    field.widget,
    field.required ? 'yes' : 'no',
    field.secret ? 'yes' : 'no',
    formatDefault(field.defaultValue),
  ]);
  return createTable(rows, { columns, border });
}

/**
 * Required properties and defaults of a document, one per line
 */
export function formatSchemaSummary(name: string, document: SchemaDocument): string {
  const lines = [chalk.bold(document.title ?? name)];
  lines.push(`  Required: ${document.required.length > 0 ? document.required.join(', ') : '(none)'}`);
  for (const [key, property] of Object.entries(document.properties)) {
    if (property.default !== undefined) {
      lines.push(`  Default:  ${key} = ${JSON.stringify(property.default)}`);
    }
  }
  return lines.join('\n');
}

// =============================================================================
// Output Helper
// =============================================================================

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Consistent output handling; writes through an injectable sink for tests.
 */
export class OutputFormatter {
  constructor(
    private readonly jsonMode: boolean = false,
    private readonly write: (line: string) => void = (line) => console.log(line),
    private readonly writeError: (line: string) => void = (line) => console.error(line)
  ) {}

  isJson(): boolean {
    return this.jsonMode;
  }

  /**
   * Output data (text or JSON based on mode)
   */
  output(text: string, jsonData: unknown): void {
    this.write(this.jsonMode ? formatJson(jsonData) : text);
  }

  success(message: string): void {
    if (this.jsonMode) {
      this.write(formatJson({ success: true, message }));
    } else {
      this.write(chalk.green('✔') + ' ' + message);
    }
  }

  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      this.write(formatJson({ success: false, error: message, details }));
    } else {
      this.writeError(chalk.red('✖') + ' ' + message);
      if (details !== undefined) {
        this.writeError(chalk.gray(typeof details === 'string' ? details : formatJson(details)));
      }
    }
  }
}
