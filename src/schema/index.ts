export {
  SchemaDocumentSchema,
  SchemaPropertySchema,
  PropertyTypeSchema,
  parseSchemaDocument,
  getRequiredProperties,
  getDefaults,
  matchesType,
} from './SchemaDocument.js';
export type { SchemaDocument, SchemaProperty, PropertyType } from './SchemaDocument.js';
export {
  loadSchemaDocument,
  loadSchemaFile,
  findComponentConfigDir,
  resetSchemaCache,
  SCHEMA_FILE_NAMES,
} from './SchemaLoader.js';
export type { SchemaKind } from './SchemaLoader.js';
export {
  compileSchema,
  validateAgainstSchema,
  validateAgainstSchemas,
  formatValidationIssues,
} from './SchemaCompiler.js';
export type { ValidationIssue, ValidationResult, CompiledSchema } from './SchemaCompiler.js';
