import type { ChatEvent, HandlerCallback } from '../transport/types.js';
import type { Filter } from '../middleware/gate.js';

/**
 * A handler as a plugin describes it, before the plugin context binds its
 * filters and forwards it to the transport
 */
export interface HandlerDefinition {
  readonly label: string;
  readonly filters: readonly Filter[];
  readonly runAsync: boolean;
  matches(event: ChatEvent): boolean;
  readonly callback: HandlerCallback;
}

export interface HandlerOptions {
  /** Admission filters, evaluated before the callback */
  filters?: readonly Filter[];
  /** Run on a detached task so dispatch is not held up */
  runAsync?: boolean;
}

/**
 * Handler for a slash command, matched case-insensitively.
 * @example commandHandler(ctx.handle, onFeedback, { filters: [privateOnly()] })
 */
export function commandHandler(
  command: string,
  callback: HandlerCallback,
  options: HandlerOptions = {}
): HandlerDefinition {
  const name = command.replace(/^\//, '').toLowerCase();
  return {
    label: `command:/${name}`,
    filters: options.filters ?? [],
    runAsync: options.runAsync ?? false,
    matches: (event) => event.kind === 'command' && event.command === name,
    callback,
  };
}

/**
 * Handler for plain messages, optionally narrowed by a predicate
 */
export function messageHandler(
  callback: HandlerCallback,
  predicate: (event: ChatEvent) => boolean = () => true,
  options: HandlerOptions = {}
): HandlerDefinition {
  return {
    label: 'message',
    filters: options.filters ?? [],
    runAsync: options.runAsync ?? false,
    matches: (event) => event.kind === 'message' && predicate(event),
    callback,
  };
}

/**
 * Handler for any event a predicate accepts
 */
export function eventHandler(
  label: string,
  predicate: (event: ChatEvent) => boolean,
  callback: HandlerCallback,
  options: HandlerOptions = {}
): HandlerDefinition {
  return {
    label,
    filters: options.filters ?? [],
    runAsync: options.runAsync ?? false,
    matches: predicate,
    callback,
  };
}
