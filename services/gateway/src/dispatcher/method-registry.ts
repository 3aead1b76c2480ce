/**
 * Method Registry
 *
 * Immutable method-name → handler table. Built once at startup; lookups
 * afterwards never observe a partially registered table.
 */

import type { HandlerBinding, MethodHandler } from './types';

export class DuplicateMethodError extends Error {
  constructor(readonly method: string) {
    super(`Method already registered: ${method}`);
    this.name = 'DuplicateMethodError';
  }
}

export class MethodRegistry {
  private readonly handlers: ReadonlyMap<string, HandlerBinding>;

  private constructor(handlers: Map<string, HandlerBinding>) {
    this.handlers = handlers;
    Object.freeze(this);
  }

  /**
   * @throws DuplicateMethodError when two bindings share a method name
   */
  static build(bindings: Iterable<HandlerBinding>): MethodRegistry {
    const handlers = new Map<string, HandlerBinding>();
    for (const binding of bindings) {
      if (handlers.has(binding.method)) {
        throw new DuplicateMethodError(binding.method);
      }
      handlers.set(binding.method, Object.freeze({ ...binding }));
    }
    return new MethodRegistry(handlers);
  }

  get(method: string): MethodHandler | undefined {
    return this.handlers.get(method)?.handler;
  }

  has(method: string): boolean {
    return this.handlers.has(method);
  }

  /** Method names in registration order. */
  list(): string[] {
    return [...this.handlers.keys()];
  }

  bindings(): HandlerBinding[] {
    return [...this.handlers.values()];
  }

  get size(): number {
    return this.handlers.size;
  }
}
