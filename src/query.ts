import { Minimatch } from 'minimatch';
import { CircularGroupReferenceError, UnknownSelectorError } from './errors.js';
import { findGarden, findGroup, type Configuration, type Garden, type Group, type Tree, type TreeContext } from './model.js';

/**
 * Tree selection.
 *
 * A query is a whitespace-separated list of terms. Each term is a tree or
 * group name, or a glob over both. Prefixes:
 *
 * - `!term`  exclude what `term` matches
 * - `%name`  match groups only
 * - `:name`  match trees only
 * - `@name`  match gardens; their trees run in the garden's context
 * - `.`      the tree containing the working directory
 *
 * Inclusions are applied left to right, then every exclusion, whatever its
 * position. The result lists each tree once, in declaration order. A tree
 * keeps the garden of the first inclusion term that selected it.
 *
 * @example
 * ```typescript
 * // trees: alpha, beta, gamma
 * resolveQuery(config, parseQuery('* !beta')).map(t => t.name); // ['alpha', 'gamma']
 * resolveQuery(config, parseQuery('!beta *')).map(t => t.name); // ['alpha', 'gamma']
 * ```
 */

export type TermTarget = 'any' | 'tree' | 'group' | 'garden' | 'current';

/** Targets that select by tree or group name. */
type NameTarget = Exclude<TermTarget, 'garden' | 'current'>;

export interface QueryTerm {
  /** Term as written, used in error messages. */
  text: string;
  exclude: boolean;
  target: TermTarget;
  pattern: string;
}

export interface Query {
  text: string;
  terms: readonly QueryTerm[];
}

export interface ResolveOptions {
  /** Fail when an inclusion term matches nothing. */
  strict?: boolean;
  /** Tree selected by `.`. */
  currentTree?: string;
}

const CURRENT = '.';
const GLOB_CHARS = /[*?[\]{}]/;

export function parseTerm(text: string): QueryTerm {
  let rest = text;
  let exclude = false;
  if (rest.startsWith('!')) {
    exclude = true;
    rest = rest.slice(1);
  }

  if (rest === CURRENT) {
    return { text, exclude, target: 'current', pattern: rest };
  }
  if (rest.startsWith('%')) {
    return { text, exclude, target: 'group', pattern: rest.slice(1) };
  }
  if (rest.startsWith(':')) {
    return { text, exclude, target: 'tree', pattern: rest.slice(1) };
  }
  if (rest.startsWith('@')) {
    return { text, exclude, target: 'garden', pattern: rest.slice(1) };
  }
  return { text, exclude, target: 'any', pattern: rest };
}

export function parseQuery(text: string): Query {
  const terms = text
    .split(/\s+/)
    .filter(Boolean)
    .map(parseTerm)
    .filter(term => term.pattern !== '');
  return { text, terms };
}

/** Returns a predicate for a name pattern; names without glob characters match exactly. */
export function compileMatcher(pattern: string): (name: string) => boolean {
  if (!GLOB_CHARS.test(pattern)) {
    return name => name === pattern;
  }
  const matcher = new Minimatch(pattern, { dot: true, nonegate: true, nocomment: true });
  return name => matcher.match(name);
}

class Selector {
  private readonly config: Configuration;
  private readonly order: Map<string, number>;
  private readonly groupCache = new Map<string, readonly Tree[]>();

  constructor(config: Configuration) {
    this.config = config;
    this.order = new Map(config.trees.map((tree, index) => [tree.name, index]));
  }

  /** Trees matched by a pattern, in declaration order. */
  match(pattern: string, target: NameTarget, stack: string[] = []): Tree[] {
    const matches = compileMatcher(pattern);
    const isGlob = GLOB_CHARS.test(pattern);
    const found = new Set<Tree>();

    if (target !== 'group') {
      for (const tree of this.config.trees) {
        if (matches(tree.name)) found.add(tree);
      }
    }
    if (target !== 'tree') {
      for (const group of this.config.groups) {
        if (!matches(group.name)) continue;
        // a glob never pulls in a group that is already being expanded
        if (isGlob && stack.includes(group.name)) continue;
        for (const tree of this.expand(group, stack)) found.add(tree);
      }
    }
    return this.sorted(found);
  }

  expand(group: Group, stack: string[] = []): readonly Tree[] {
    const cached = this.groupCache.get(group.name);
    if (cached) {
      return cached;
    }
    if (stack.includes(group.name)) {
      throw new CircularGroupReferenceError([...stack.slice(stack.indexOf(group.name)), group.name]);
    }

    const next = [...stack, group.name];
    const found = new Set<Tree>();
    for (const member of group.members) {
      for (const tree of this.match(member, 'any', next)) found.add(tree);
    }
    const trees = this.sorted(found);
    // nested expansions may have skipped groups on the stack
    if (stack.length === 0) {
      this.groupCache.set(group.name, trees);
    }
    return trees;
  }

  /** Trees of every garden whose name matches, each once, paired with the first garden that has it. */
  gardens(pattern: string): TreeContext[] {
    const matches = compileMatcher(pattern);
    const contexts = new Map<string, TreeContext>();
    for (const garden of this.config.gardens) {
      if (!matches(garden.name)) continue;
      for (const tree of this.expandGarden(garden)) {
        if (!contexts.has(tree.name)) contexts.set(tree.name, { tree, garden });
      }
    }
    return this.sortedContexts(contexts.values());
  }

  expandGarden(garden: Garden): Tree[] {
    const found = new Set<Tree>();
    for (const pattern of garden.trees) {
      for (const tree of this.match(pattern, 'tree')) found.add(tree);
    }
    for (const pattern of garden.groups) {
      for (const tree of this.match(pattern, 'group')) found.add(tree);
    }
    return this.sorted(found);
  }

  sorted(trees: Iterable<Tree>): Tree[] {
    return [...trees].sort((a, b) => this.position(a) - this.position(b));
  }

  sortedContexts(contexts: Iterable<TreeContext>): TreeContext[] {
    return [...contexts].sort((a, b) => this.position(a.tree) - this.position(b.tree));
  }

  private position(tree: Tree): number {
    return this.order.get(tree.name) ?? 0;
  }
}

/** Expands a group into its member trees, in declaration order. */
export function expandGroup(config: Configuration, name: string): Tree[] {
  const group = findGroup(config, name);
  if (!group) {
    return [];
  }
  return [...new Selector(config).expand(group)];
}

/** Expands a garden into its trees, in declaration order. */
export function expandGarden(config: Configuration, name: string): Tree[] {
  const garden = findGarden(config, name);
  if (!garden) {
    return [];
  }
  return new Selector(config).expandGarden(garden);
}

/** Like `resolveQuery`, keeping the garden each tree was selected through. */
export function resolveContexts(
  config: Configuration,
  query: Query | string,
  options: ResolveOptions = {}
): TreeContext[] {
  const parsed = typeof query === 'string' ? parseQuery(query) : query;
  const selector = new Selector(config);

  const termMatches = (term: QueryTerm): TreeContext[] => {
    switch (term.target) {
      case 'current':
        return config.trees.filter(tree => tree.name === options.currentTree).map(tree => ({ tree }));
      case 'garden':
        return selector.gardens(term.pattern);
      default:
        return selector.match(term.pattern, term.target).map(tree => ({ tree }));
    }
  };

  const selected = new Map<string, TreeContext>();
  for (const term of parsed.terms) {
    if (term.exclude) continue;
    const matched = termMatches(term);
    if (matched.length === 0 && options.strict) {
      throw new UnknownSelectorError(term.text);
    }
    for (const context of matched) {
      if (!selected.has(context.tree.name)) selected.set(context.tree.name, context);
    }
  }

  const excluded = new Set<string>();
  for (const term of parsed.terms) {
    if (!term.exclude) continue;
    for (const context of termMatches(term)) excluded.add(context.tree.name);
  }

  return selector.sortedContexts([...selected.values()].filter(context => !excluded.has(context.tree.name)));
}

export function resolveQuery(config: Configuration, query: Query | string, options: ResolveOptions = {}): Tree[] {
  return resolveContexts(config, query, options).map(context => context.tree);
}

/** True when the query has a `.` term, which needs the current tree resolved first. */
export function usesCurrentTree(query: Query): boolean {
  return query.terms.some(term => term.target === 'current');
}
