/**
 * Discriminator -> handler table, populated once at startup.
 *
 * Event handlers are keyed by event kind; tool handlers by tool name. Tool names claimed by
 * external services are declared here as well so that the full tool set the model sees is known.
 * Registering a discriminator twice is a setup error, and after lock() nothing can be added.
 */

import type { EventKind, RuntimeEventOf } from '../core/contracts/events';
import type { ToolDefinition } from '../core/contracts/tools';
import { DuplicateRegistrationError, RegistryLockedError } from '../core/errors';

export type EventHandler<K extends EventKind> = (event: RuntimeEventOf<K>) => Promise<void> | void;

export type ToolClaim = 'in_process' | 'external' | 'unknown';

type EventHandlerTable<P extends EventKind = EventKind> = { [K in P]?: EventHandler<K> };

export class HandlerRegistry {
  private readonly eventHandlers: EventHandlerTable = {};
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly externalTools = new Set<string>();
  private locked = false;

  onEvent<K extends Exclude<EventKind, 'tool_invocation'>>(kind: K, handler: EventHandler<K>): void {
    const discriminator = `event:${kind}`;
    this.assertWritable(discriminator);
    if (this.eventHandlers[kind]) {
      throw new DuplicateRegistrationError(discriminator);
    }
    const handlers: EventHandlerTable<K> = this.eventHandlers;
    handlers[kind] = handler;
  }

  onToolCall(definition: ToolDefinition): void {
    const discriminator = `tool:${definition.name}`;
    this.assertWritable(discriminator);
    if (!definition.name) {
      throw new Error('Tool name is required');
    }
    if (this.tools.has(definition.name) || this.externalTools.has(definition.name)) {
      throw new DuplicateRegistrationError(discriminator);
    }
    this.tools.set(definition.name, definition);
  }

  /** Declares a tool answered by an external service's own subscription. */
  declareExternalTool(name: string): void {
    const discriminator = `tool:${name}`;
    this.assertWritable(discriminator);
    if (this.tools.has(name) || this.externalTools.has(name)) {
      throw new DuplicateRegistrationError(discriminator);
    }
    this.externalTools.add(name);
  }

  lock(): void {
    this.locked = true;
  }

  isLocked(): boolean {
    return this.locked;
  }

  eventHandler<K extends EventKind>(kind: K): EventHandler<K> | undefined {
    return this.eventHandlers[kind];
  }

  tool(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  claimOf(toolName: string): ToolClaim {
    if (this.tools.has(toolName)) {
      return 'in_process';
    }
    if (this.externalTools.has(toolName)) {
      return 'external';
    }
    return 'unknown';
  }

  /** Every tool name presented to the model, in-process first. */
  toolNames(): string[] {
    return [...this.tools.keys(), ...this.externalTools];
  }

  private assertWritable(discriminator: string): void {
    if (this.locked) {
      throw new RegistryLockedError(discriminator);
    }
  }
}
