// Main entry point
export { Layout } from './Layout.js';
export type { LayoutConfig } from './Layout.js';

// Domain model
export type { ParsedLine } from './domain/model/ParsedLine.js';

// Domain ports
export type { LayoutLoader, LoaderOptions } from './domain/ports/LayoutLoader.js';

// Infrastructure adapters (built-in loaders)
export { CsvLayoutLoader } from './infrastructure/loaders/CsvLayoutLoader.js';
export type { CsvLayoutLoaderOptions } from './infrastructure/loaders/CsvLayoutLoader.js';

// Re-export commonly used types from @fixedline/core for convenience
export type {
  FixedRecord,
  ColumnOptions,
  ColumnType,
  Alignment,
  InheritableOptions,
  SchemaOptions,
  SchemaBuilder,
  LinePredicate,
  ReferenceDeclaration,
  LayoutSegment,
  SchemaIssue,
  SchemaIssueCode,
  SchemaValidationResult,
  DomainEvent,
  EventType,
  EventPayload,
  SchemaDefinedEvent,
  ReferenceResolvedEvent,
  ReferenceFailedEvent,
  OptionsPropagatedEvent,
} from '@fixedline/core';

export {
  Schema,
  Column,
  SchemaReference,
  EventBus,
  FixedLineError,
  ConfigError,
  DuplicateNameError,
  SchemaError,
  FormatError,
} from '@fixedline/core';
