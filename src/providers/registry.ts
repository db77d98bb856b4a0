/**
 * Provider Registry
 *
 * Maps resource types to the handlers that create, read, update and destroy
 * them. The registry is also the source of per-type attribute schemas used by
 * the graph builder and the diff engine.
 */

import { ValidationError } from "../errors.js";
import type { ResourceHandler, ResourceTypeSchema } from "../types.js";

export class ProviderRegistry {
  private handlers = new Map<string, ResourceHandler>();

  constructor(handlers: ResourceHandler[] = []) {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  /**
   * Register a handler. Types are unique; registering one twice is an error.
   */
  register(handler: ResourceHandler): this {
    if (handler.type !== handler.schema.type) {
      throw new ValidationError(`Handler for "${handler.type}" declares a schema for "${handler.schema.type}"`);
    }
    if (this.handlers.has(handler.type)) {
      throw new ValidationError(`Resource type "${handler.type}" is already registered`);
    }
    this.handlers.set(handler.type, handler);
    return this;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  get(type: string): ResourceHandler | undefined {
    return this.handlers.get(type);
  }

  /** Like `get`, but an unknown type is a validation error. */
  require(type: string): ResourceHandler {
    const handler = this.handlers.get(type);
    if (!handler) {
      throw new ValidationError(`No handler registered for resource type "${type}"`);
    }
    return handler;
  }

  getSchema(type: string): ResourceTypeSchema | undefined {
    return this.handlers.get(type)?.schema;
  }

  listTypes(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
