/**
 * Form Fields
 *
 * The rendering view of a schema document: fields in propertyOrder with a
 * widget hint, and the secret convention of the host platform, where keys
 * starting with '#' are stored encrypted and never displayed.
 */

import type { PropertyType, SchemaDocument } from '../schema/SchemaDocument.js';

export type FormWidget = 'text' | 'number' | 'checkbox' | 'password' | 'textarea';

export interface FormField {
  key: string;
  title: string;
  description?: string;
  type: PropertyType;
  required: boolean;
  defaultValue?: string | number | boolean;
  propertyOrder?: number;
  secret: boolean;
  widget: FormWidget;
}

export const SECRET_PREFIX = '#';
export const SECRET_MASK = '*****';

export function isSecretKey(key: string): boolean {
  return key.startsWith(SECRET_PREFIX);
}

function widgetFor(type: PropertyType, format: string | undefined): FormWidget {
  if (format === 'password' || format === 'textarea') {
    return format;
  }
  switch (type) {
    case 'boolean':
      return 'checkbox';
    case 'integer':
    case 'number':
      return 'number';
    default:
      return 'text';
  }
}

/**
 * Fields sorted by propertyOrder; unordered fields follow in declaration order.
 */
export function getFormFields(document: SchemaDocument): FormField[] {
  const required = new Set(document.required);
  const fields = Object.entries(document.properties).map(
    ([key, property], index): FormField & { index: number } => ({
      key,
      title: property.title ?? key,
      description: property.description,
      type: property.type,
      required: required.has(key),
      defaultValue: property.default,
      propertyOrder: property.propertyOrder,
      secret: isSecretKey(key),
      widget: widgetFor(property.type, property.format),
      index,
    })
  );

  fields.sort((a, b) => {
    const orderA = a.propertyOrder ?? Number.POSITIVE_INFINITY;
    const orderB = b.propertyOrder ?? Number.POSITIVE_INFINITY;
    if (orderA !== orderB) {
      return orderA < orderB ? -1 : 1;
    }
    return a.index - b.index;
  });

  return fields.map(({ index: _index, ...field }) => field);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy of `values` with every non-empty secret replaced by a mask.
 * Nested plain objects are masked too.
 */
export function maskSecrets(values: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (isSecretKey(key) && value !== '' && value !== null && value !== undefined) {
      masked[key] = SECRET_MASK;
    } else if (isPlainObject(value)) {
      masked[key] = maskSecrets(value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}
