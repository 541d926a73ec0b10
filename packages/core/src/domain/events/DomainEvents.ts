/** Emitted when a top-level schema is added to a layout. */
export interface SchemaDefinedEvent {
  readonly type: 'schema:defined';
  readonly schema: string;
  readonly fields: readonly string[];
  readonly timestamp: number;
}

/** Emitted the first time a reference is bound to its target schema. */
export interface ReferenceResolvedEvent {
  readonly type: 'reference:resolved';
  /** Schema declaring the reference. */
  readonly schema: string;
  /** Store name of the reference. */
  readonly field: string;
  /** Name of the schema the reference now points at. */
  readonly target: string;
  readonly timestamp: number;
}

/** Emitted on every failed attempt to resolve a reference. */
export interface ReferenceFailedEvent {
  readonly type: 'reference:failed';
  readonly schema: string;
  readonly field: string;
  /** Name that was looked up. */
  readonly schemaName: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when an option set reaches the subtree of a referenced schema. */
export interface OptionsPropagatedEvent {
  readonly type: 'options:propagated';
  readonly schema: string;
  readonly field: string;
  readonly target: string;
  /** Options of the target schema itself that changed. */
  readonly keys: readonly string[];
  readonly timestamp: number;
}

/** Union of all domain events. Use `type` to discriminate. */
export type DomainEvent = SchemaDefinedEvent | ReferenceResolvedEvent | ReferenceFailedEvent | OptionsPropagatedEvent;

/** String literal union of all event type identifiers. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
