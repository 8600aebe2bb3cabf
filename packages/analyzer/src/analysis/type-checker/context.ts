import type { Type } from "#types";

/**
 * Variables in scope while checking an expression.
 *
 * Contexts are never mutated once handed out: `extend` creates a child
 * scope holding new bindings.
 */
export class TypingContext {
  private constructor(
    private readonly bindings: ReadonlyMap<string, Type>,
    private readonly parent?: TypingContext,
  ) {}

  static root(): TypingContext {
    return new TypingContext(new Map());
  }

  extend(bindings: Iterable<[string, Type]>): TypingContext {
    return new TypingContext(new Map(bindings), this);
  }

  lookup(name: string): Type | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }
}
