import { literal, parseExpression, type Expression } from './expression.js';

export type ScopeLayerKind = 'process' | 'global' | 'garden' | 'tree' | 'override' | 'builtin';

export interface ScopeLayer {
  kind: ScopeLayerKind;
  label: string;
  entries: ReadonlyMap<string, Expression>;
}

export interface ScopeEntry {
  name: string;
  expression: Expression;
  layer: ScopeLayer;
}

/**
 * Read-only chain of variable layers, outermost first:
 * process environment, global variables, garden variables (when the tree
 * was selected through a garden), tree variables, `--define` overrides,
 * built-ins.
 *
 * Lookups walk the chain innermost-first. Layers are shared between scopes
 * but never written to; each tree gets its own composed view.
 */
export class Scope {
  readonly id: string;
  readonly layers: readonly ScopeLayer[];

  constructor(id: string, layers: readonly ScopeLayer[]) {
    this.id = id;
    this.layers = Object.freeze([...layers]);
  }

  lookup(name: string): ScopeEntry | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      const expression = layer.entries.get(name);
      if (expression !== undefined) {
        return { name, expression, layer };
      }
    }
    return undefined;
  }

  /** Names visible from this scope, outermost declaration order, skipping the given layer kinds. */
  names(exclude: readonly ScopeLayerKind[] = []): string[] {
    const seen = new Set<string>();
    for (const layer of this.layers) {
      if (exclude.includes(layer.kind)) continue;
      for (const name of layer.entries.keys()) {
        seen.add(name);
      }
    }
    return [...seen];
  }
}

/** Layer of user expressions, parsed once. */
export function expressionLayer(
  kind: ScopeLayerKind,
  label: string,
  values: Iterable<readonly [string, string]>
): ScopeLayer {
  const entries = new Map<string, Expression>();
  for (const [name, raw] of values) {
    entries.set(name, parseExpression(raw));
  }
  return { kind, label, entries };
}

/** Layer of values that are never interpreted (environment, built-ins). */
export function literalLayer(
  kind: ScopeLayerKind,
  label: string,
  values: Readonly<Record<string, string | undefined>>
): ScopeLayer {
  const entries = new Map<string, Expression>();
  for (const [name, value] of Object.entries(values)) {
    if (value !== undefined) {
      entries.set(name, literal(value));
    }
  }
  return { kind, label, entries };
}
