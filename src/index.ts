// Canonical model
export type {
  RepresentationTag,
  CanonicalType,
  LogicalType,
  DefaultToken,
  Literal,
  DefaultExpr,
  ReferentialAction,
  ColumnDef,
  PrimaryKeyDef,
  ForeignKeyDef,
  UniqueDef,
  IndexDef,
  SchemaDefinition,
  ConstraintKind,
  ConstraintDef,
  ConstraintRef,
  OperationDef,
  LineageEdge,
  CanonicalIR,
} from './model';

export {
  representations,
  isRepresentationTag,
  createIR,
  createSchema,
  typeToString,
} from './model';

// Errors
export type { SourceSpan, TranslationErrorCode, InvariantCategory, InvariantViolation, SchemaIssue } from './errors';
export {
  TranslationError,
  ParseError,
  UnknownTypeError,
  UnknownConstraintError,
  UnsupportedConstructError,
  InvariantViolationError,
  AmbiguousMappingError,
  InvalidSchemaError,
  TranslationCancelledError,
} from './errors';

// Mapping tables
export type { CatalogData, Construct } from './catalog';
export { Catalog, defaultCatalog, builtinCatalogData } from './catalog';

// Adapters
export type { FormatOptions, RepresentationAdapter } from './adapter';
export { SqlAdapter, escapeIdentifier } from './sqlAdapter';
export type { FunctionalProgram, AlterationCall, CreateTableArgs } from './callTreeAdapter';
export { CallTreeAdapter, decodeCallTree } from './callTreeAdapter';
export { MermaidAdapter } from './mermaidAdapter';
export { SetAdapter } from './setAdapter';

// Validation and round-trip checking
export type { ValidationOptions } from './validator';
export { validateIR } from './validator';
export { compareIR } from './roundTrip';

// Translation
export type { TranslationMode, TranslateOptions, Translation, AdapterRegistry } from './translator';
export { Translator, createAdapters } from './translator';
export type { TranslationResult } from './translationService';
export { TranslationService, translate } from './translationService';

// Configuration
export type { TranslationConfig } from './config';
export { loadConfig, parseConfig, ConfigError, configFileName } from './config';

// Database introspection
export type { DbClient } from './schemaExtractor';
export { extractTable, listTables } from './schemaExtractor';
export { DatabaseConnection } from './database';

// JSON Schema generation
export type { JsonSchema } from './jsonSchemaGenerator';
export { generateJsonSchema } from './jsonSchemaGenerator';
