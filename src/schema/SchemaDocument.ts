/**
 * Schema Document
 *
 * The JSON Schema subset the component's form descriptions are written in,
 * described as a zod meta-schema. A document that parses here is what the
 * host platform can render and validate:
 * - an object schema with typed, optionally ordered properties
 * - a `required` list naming only declared properties, without repeats
 * - defaults of the declared type
 * - unique propertyOrder values
 */

import { z } from 'zod';
import { SchemaDocumentError } from '../errors/ComponentErrors.js';

export const PropertyTypeSchema = z.enum(['string', 'integer', 'number', 'boolean']);

export type PropertyType = z.infer<typeof PropertyTypeSchema>;

export const SchemaPropertySchema = z
  .object({
    type: PropertyTypeSchema,
    title: z.string().optional(),
    description: z.string().optional(),
    format: z.string().optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).optional(),
    propertyOrder: z.number().int().positive().optional(),
    options: z.record(z.unknown()).optional(),
  })
  .strict();

export type SchemaProperty = z.infer<typeof SchemaPropertySchema>;

export const SchemaDocumentSchema = z
  .object({
    $schema: z.string().optional(),
    type: z.literal('object'),
    title: z.string().optional(),
    description: z.string().optional(),
    required: z.array(z.string()).default([]),
    properties: z.record(SchemaPropertySchema),
  })
  .strict()
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.required.forEach((name, index) => {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['required', index],
          message: `"${name}" is listed more than once`,
        });
      }
      seen.add(name);
      if (!Object.prototype.hasOwnProperty.call(doc.properties, name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['required', index],
          message: `"${name}" is not a declared property`,
        });
      }
    });

    const orders = new Map<number, string>();
    for (const [key, property] of Object.entries(doc.properties)) {
      if (property.default !== undefined && !matchesType(property.type, property.default)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['properties', key, 'default'],
          message: `default ${JSON.stringify(property.default)} is not of type ${property.type}`,
        });
      }
      if (property.propertyOrder !== undefined) {
        const other = orders.get(property.propertyOrder);
        if (other !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['properties', key, 'propertyOrder'],
            message: `propertyOrder ${property.propertyOrder} is already used by "${other}"`,
          });
        } else {
          orders.set(property.propertyOrder, key);
        }
      }
    }
  });

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;

/**
 * Whether a JSON value is an instance of a schema property type
 */
export function matchesType(type: PropertyType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * Render a zod issue path the way JSON pointers read: properties.port.default
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join('.');
}

/**
 * Check a parsed JSON value and return it as a typed document.
 * @param source - where the value came from, used in the error
 * @throws SchemaDocumentError listing every problem found
 */
export function parseSchemaDocument(raw: unknown, source = '<inline>'): SchemaDocument {
  const result = SchemaDocumentSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const problems = result.error.issues.map((issue) => {
    const path = formatIssuePath(issue.path);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new SchemaDocumentError(
    `Schema document ${source} is not well-formed: ${problems.join('; ')}`,
    source,
    problems
  );
}

/**
 * Names of the properties the document requires, in document order
 */
export function getRequiredProperties(document: SchemaDocument): string[] {
  return [...document.required];
}

/**
 * Defaults declared in the document, keyed by property
 */
export function getDefaults(document: SchemaDocument): Record<string, string | number | boolean> {
  const defaults: Record<string, string | number | boolean> = {};
  for (const [key, property] of Object.entries(document.properties)) {
    if (property.default !== undefined) {
      defaults[key] = property.default;
    }
  }
  return defaults;
}
