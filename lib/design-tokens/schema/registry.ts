import { DraftSchemaHandler, V2025_10SchemaHandler, type SchemaHandler } from './handler';
import { SCHEMA_VERSION_ORDER, type SchemaVersion } from './version';

/**
 * Version -> handler map. Registration normally happens once at start-up
 * (or in tests that swap a handler); lookups never mutate.
 */
export class SchemaRegistry {
  private readonly handlers = new Map<SchemaVersion, SchemaHandler>();

  constructor(handlers: readonly SchemaHandler[] = [new DraftSchemaHandler(), new V2025_10SchemaHandler()]) {
    handlers.forEach((handler) => this.register(handler));
  }

  /** Adds a handler, replacing any handler already registered for its version. */
  register(handler: SchemaHandler): void {
    this.handlers.set(handler.version, handler);
  }

  get(version: SchemaVersion): SchemaHandler {
    const handler = this.handlers.get(version);
    if (!handler) {
      throw new Error(`no handler registered for schema version: ${version}`);
    }
    return handler;
  }

  has(version: SchemaVersion): boolean {
    return this.handlers.has(version);
  }

  /** Registered versions in declaration order. */
  versions(): SchemaVersion[] {
    return SCHEMA_VERSION_ORDER.filter((version) => this.handlers.has(version));
  }
}

export const defaultRegistry = new SchemaRegistry();
