/**
 * Orders top-level definitions so that each is checked after everything
 * it refers to
 */

import { Expression } from "#ast";
import { Result } from "#result";

import type { ContractAnalysis } from "../contract-analysis.js";
import { CheckErrors, type CheckError } from "../errors.js";
import type { AnalysisPass } from "../pass.js";

type Namespace = "value" | "trait";

interface Definition {
  /** Name the form defines, if any */
  name?: string;
  namespace: Namespace;
  /** Checked before any other form */
  leading: boolean;
  /** Sub-expressions that may refer to other definitions */
  body: Expression[];
  /** Namespaces the body's references are looked up in */
  scope: readonly Namespace[];
}

const everywhere: readonly Namespace[] = ["value", "trait"];

const valueDefinitions = new Set([
  "define-constant",
  "define-data-var",
  "define-map",
  "define-fungible-token",
  "define-non-fungible-token",
]);

const functionDefinitions = new Set([
  "define-public",
  "define-private",
  "define-read-only",
]);

function describe(expr: Expression): Definition {
  const items = Expression.matchList(expr) ?? [];
  const [head, first, ...rest] = items;
  const form = items.length > 0 ? Expression.matchAtom(head) : undefined;
  const statement: Definition = {
    namespace: "value",
    leading: false,
    body: items,
    scope: everywhere,
  };
  const named = (
    namespace: Namespace,
    scope: readonly Namespace[] = everywhere,
  ): Definition => ({
    name: items.length > 1 ? Expression.matchAtom(first) : undefined,
    namespace,
    leading: false,
    body: rest,
    scope,
  });

  if (form === undefined) {
    return statement;
  }

  if (valueDefinitions.has(form)) {
    return named("value");
  }

  if (functionDefinitions.has(form)) {
    const signature =
      items.length > 1 ? Expression.matchList(first) : undefined;
    if (!signature || signature.length === 0) {
      return statement;
    }
    const [nameExpr, ...args] = signature;
    return {
      ...statement,
      name: Expression.matchAtom(nameExpr),
      // parameter types only; parameter names are not references
      body: [...pairValues(args), ...rest],
    };
  }

  switch (form) {
    // method names and types are not references to definitions
    case "define-trait":
      return named("trait", ["trait"]);
    case "use-trait":
      return { ...named("trait", []), leading: true };
    case "impl-trait":
      return { namespace: "trait", leading: true, body: [], scope: [] };
    default:
      return statement;
  }
}

/**
 * Value positions of a `(name expr)` pair list; items of any other shape
 * are kept whole
 */
function pairValues(pairs: Expression[]): Expression[] {
  return pairs.map((pair) => {
    const items = Expression.matchList(pair);
    return items?.length === 2 && Expression.isAtom(items[0])
      ? items[1]
      : pair;
  });
}

/**
 * Sub-expressions of `expr` that may refer to definitions. Tuple keys,
 * `get` fields, `let` binding names and the function named by
 * `contract-call?` are names of their own.
 */
function referringItems(expr: Expression.List): Expression[] {
  const [head, ...args] = expr.items;
  const form = head === undefined ? undefined : Expression.matchAtom(head);
  switch (form) {
    case "tuple":
      return pairValues(args);
    case "get":
      return args.slice(1);
    case "contract-call?":
      return [...args.slice(0, 1), ...args.slice(2)];
    case "let": {
      const [bindings, ...body] = args;
      const pairs = bindings && Expression.matchList(bindings);
      return pairs ? [...pairValues(pairs), ...body] : args;
    }
    default:
      return expr.items;
  }
}

/**
 * Names referred to within `exprs`, by namespace
 */
function collectReferences(exprs: Expression[]): Record<Namespace, string[]> {
  const references: Record<Namespace, string[]> = { value: [], trait: [] };
  const pending = [...exprs];

  for (let expr = pending.pop(); expr; expr = pending.pop()) {
    switch (expr.kind) {
      case "atom":
        references.value.push(expr.name);
        break;
      case "trait-reference":
        references.trait.push(expr.name);
        break;
      case "list":
        pending.push(...referringItems(expr));
        break;
    }
  }
  return references;
}

/**
 * Indexes of `expressions` in an order where every definition follows the
 * definitions it depends on, and otherwise keeps source order;
 * `use-trait` and `impl-trait` forms come first.
 */
export function sortDefinitions(
  expressions: Expression[],
): Result<number[], CheckError> {
  const definitions = expressions.map(describe);

  // first definition of each name wins; redefinitions are reported later
  const indexes: Record<Namespace, Map<string, number>> = {
    value: new Map(),
    trait: new Map(),
  };
  definitions.forEach((definition, index) => {
    const { name, namespace } = definition;
    if (name !== undefined && !indexes[namespace].has(name)) {
      indexes[namespace].set(name, index);
    }
  });

  const dependencies = definitions.map((definition) => {
    const references = collectReferences(definition.body);
    const found = new Set<number>();
    for (const namespace of definition.scope) {
      for (const name of references[namespace]) {
        const index = indexes[namespace].get(name);
        if (index !== undefined) {
          found.add(index);
        }
      }
    }
    return [...found].sort((a, b) => a - b);
  });

  const roots: number[] = [];
  definitions.forEach((definition, index) => {
    if (definition.leading) {
      roots.push(index);
    }
  });
  definitions.forEach((definition, index) => {
    if (!definition.leading) {
      roots.push(index);
    }
  });

  return topologicalOrder(roots, dependencies, (index) => {
    const { name } = definitions[index];
    return name ?? `#${index}`;
  });
}

enum Mark {
  Unvisited,
  InProgress,
  Done,
}

/**
 * Depth-first post-order over `dependencies`, starting from each root in
 * turn; fails on the first cycle found
 */
function topologicalOrder(
  roots: number[],
  dependencies: number[][],
  nameOf: (index: number) => string,
): Result<number[], CheckError> {
  const marks = dependencies.map(() => Mark.Unvisited);
  const order: number[] = [];

  for (const root of roots) {
    if (marks[root] !== Mark.Unvisited) {
      continue;
    }

    const stack = [{ node: root, next: 0 }];
    marks[root] = Mark.InProgress;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const edges = dependencies[frame.node];

      if (frame.next < edges.length) {
        const dependency = edges[frame.next++];
        if (marks[dependency] === Mark.InProgress) {
          const start = stack.findIndex((f) => f.node === dependency);
          const cycle = stack.slice(start).map((f) => nameOf(f.node));
          return Result.err(CheckErrors.circularReference(cycle));
        }
        if (marks[dependency] === Mark.Unvisited) {
          marks[dependency] = Mark.InProgress;
          stack.push({ node: dependency, next: 0 });
        }
        continue;
      }

      marks[frame.node] = Mark.Done;
      order.push(frame.node);
      stack.pop();
    }
  }

  return Result.ok(order);
}

/**
 * Records the analysis order of a contract's top-level forms
 */
export const definitionSorter: AnalysisPass = {
  run(analysis: ContractAnalysis): Result<void, CheckError> {
    const sorted = sortDefinitions(analysis.expressions);
    if (!sorted.success) {
      return sorted;
    }
    analysis.topLevelExpressionSorting = sorted.value;
    return Result.ok(undefined);
  },
};
