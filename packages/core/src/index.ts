// Domain model
export { Schema, schemaOptions, RESERVED_PREFIXES } from './domain/model/Schema.js';
export type {
  SchemaConfig,
  SchemaOptions,
  SchemaOptionValues,
  SchemaParent,
  SchemaBuilder,
  LinePredicate,
  ReferenceDeclaration,
  LookupResult,
  LayoutSegment,
} from './domain/model/Schema.js';
export { Column, columnOptions, isColumnType, COLUMN_TYPES } from './domain/model/Column.js';
export type {
  ColumnOptions,
  ColumnSettings,
  ColumnOptionValues,
  ColumnType,
  ValueParser,
  ValueFormatter,
} from './domain/model/Column.js';
export { SchemaReference } from './domain/model/FieldEntry.js';
export type {
  FieldEntry,
  ColumnEntry,
  NestedSchemaEntry,
  ResolutionState,
  Delivery,
} from './domain/model/FieldEntry.js';
export {
  OptionTable,
  defineOptions,
  optionsFrom,
  FILL_MISSING,
  toName,
  isIdentifier,
  isBoolean,
  isPositiveInteger,
  isNonEmptyString,
  isSingleCharacter,
  oneOf,
} from './domain/model/Options.js';
export type {
  OptionSpec,
  OptionSpecs,
  OptionInput,
  OptionDefinition,
  OptionSource,
  OptionProvenance,
  MergePolicy,
} from './domain/model/Options.js';
export {
  ALIGNMENTS,
  isAlignment,
  inheritableSpecs,
  referenceOptions,
  catalogOptions,
} from './domain/model/LayoutOptions.js';
export type { Alignment, InheritableOptions, InheritableOptionValues } from './domain/model/LayoutOptions.js';
export type { FixedRecord } from './domain/model/Record.js';
export { isRecord } from './domain/model/Record.js';
export { FixedLineError, ConfigError, DuplicateNameError, SchemaError, FormatError } from './domain/model/Errors.js';
export type { FixedLineErrorCode } from './domain/model/Errors.js';
export type {
  SchemaIssue,
  SchemaIssueCode,
  SchemaValidationResult,
} from './domain/model/ValidationResult.js';
export { validResult, invalidResult, toValidationResult, describeIssues } from './domain/model/ValidationResult.js';

// Domain services
export { SchemaValidator } from './domain/services/SchemaValidator.js';
export { codepoints, width, sliceCodepoints } from './domain/services/Codepoints.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SchemaDefinedEvent,
  ReferenceResolvedEvent,
  ReferenceFailedEvent,
  OptionsPropagatedEvent,
} from './domain/events/DomainEvents.js';

// Ports (for custom implementations)
export type { FieldCodec } from './domain/ports/FieldCodec.js';
export type { SchemaCatalog } from './domain/ports/SchemaCatalog.js';
export type { EventSink } from './domain/ports/EventSink.js';

// Application
export { EventBus } from './application/EventBus.js';
