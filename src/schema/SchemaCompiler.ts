/**
 * Schema Compiler
 *
 * Turns a schema document into a zod validator for user input.
 * Defaults are filled in before the required check, so a required property
 * with a default never fails for being absent. Undeclared keys pass through.
 */

import { z } from 'zod';
import { SchemaDocument, SchemaProperty, formatIssuePath } from './SchemaDocument.js';

export interface ValidationIssue {
  /** Dotted path of the offending value, empty for the root */
  path: string;
  message: string;
}

export type ValidationResult =
  | { valid: true; value: Record<string, unknown> }
  | { valid: false; issues: ValidationIssue[] };

export type CompiledSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

const compiled = new WeakMap<SchemaDocument, CompiledSchema>();

function baseValidator(property: SchemaProperty): z.ZodTypeAny {
  switch (property.type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
  }
}

/**
 * Build (or reuse) the validator for a document.
 */
export function compileSchema(document: SchemaDocument): CompiledSchema {
  const existing = compiled.get(document);
  if (existing) return existing;

  const required = new Set(document.required);
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, property] of Object.entries(document.properties)) {
    const base = baseValidator(property);
    if (property.default !== undefined) {
      shape[key] = base.default(property.default);
    } else if (required.has(key)) {
      shape[key] = base;
    } else {
      shape[key] = base.optional();
    }
  }

  const schema: CompiledSchema = z.object(shape).passthrough();
  compiled.set(document, schema);
  return schema;
}

function toValidationIssue(document: SchemaDocument, issue: z.ZodIssue): ValidationIssue {
  const path = formatIssuePath(issue.path);
  if (issue.code === z.ZodIssueCode.invalid_type) {
    if (issue.path.length === 0) {
      return { path, message: 'expected an object' };
    }
    const key = String(issue.path[0]);
    if (issue.received === z.ZodParsedType.undefined) {
      return { path, message: `missing required property "${key}"` };
    }
    const expected = document.properties[key]?.type ?? issue.expected;
    return { path, message: `expected ${expected}, received ${issue.received}` };
  }
  return { path, message: issue.message };
}

/**
 * Validate a value against a document, applying its defaults.
 */
export function validateAgainstSchema(document: SchemaDocument, value: unknown): ValidationResult {
  const result = compileSchema(document).safeParse(value);
  if (result.success) {
    return { valid: true, value: result.data };
  }
  return {
    valid: false,
    issues: result.error.issues.map((issue) => toValidationIssue(document, issue)),
  };
}

/**
 * Validate one value against several documents that each describe part of it.
 * The returned value merges every document's output, defaults included.
 */
export function validateAgainstSchemas(
  documents: readonly SchemaDocument[],
  value: unknown
): ValidationResult {
  const issues: ValidationIssue[] = [];
  let merged: Record<string, unknown> = {};

  for (const document of documents) {
    const result = validateAgainstSchema(document, value);
    if (result.valid) {
      merged = { ...merged, ...result.value };
    } else {
      for (const issue of result.issues) {
        if (!issues.some((i) => i.path === issue.path && i.message === issue.message)) {
          issues.push(issue);
        }
      }
    }
  }

  return issues.length > 0 ? { valid: false, issues } : { valid: true, value: merged };
}

/**
 * One line per issue, e.g. `port: expected integer, received string`
 */
export function formatValidationIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('\n');
}
