import { ConfigurationError } from './errors.js';
import { toEnvironmentEntries, type EnvironmentEntry } from './environment.js';
import type { ConfigDocument, GardenDocument, TemplateDocument, TreeDocument } from './schema.js';

export const DEFAULT_SHELL = 'sh';
export const DEFAULT_ROOT = '${GROVE_CONFIG_DIR}';

/**
 * One managed working tree.
 *
 * `path` is still an expression here; the workspace resolves it against
 * `GROVE_ROOT` on first use.
 */
export interface Tree {
  readonly name: string;
  readonly path: string;
  readonly url?: string;
  readonly description?: string;
  /** Interpreter override for this tree's commands. */
  readonly shell?: string;
  readonly variables: ReadonlyMap<string, string>;
  readonly environment: readonly EnvironmentEntry[];
  readonly commands: ReadonlyMap<string, readonly string[]>;
}

/** Named list of tree and group patterns, used only for selection. */
export interface Group {
  readonly name: string;
  readonly members: readonly string[];
}

/**
 * Named collection of trees and groups with variables, environment and
 * commands of its own. A tree selected through a garden runs with them.
 */
export interface Garden {
  readonly name: string;
  /** Tree name patterns. */
  readonly trees: readonly string[];
  /** Group name patterns. */
  readonly groups: readonly string[];
  readonly variables: ReadonlyMap<string, string>;
  readonly environment: readonly EnvironmentEntry[];
  readonly commands: ReadonlyMap<string, readonly string[]>;
}

/** A tree together with the garden it was selected through, if any. */
export interface TreeContext {
  readonly tree: Tree;
  readonly garden?: Garden;
}

export interface Configuration {
  /** Directory seeded into `${GROVE_CONFIG_DIR}`. */
  readonly dirname: string;
  /** Files the configuration was merged from, lowest precedence first. */
  readonly sources: readonly string[];
  /** `grove.root` expression. */
  readonly root: string;
  /** Process-wide default interpreter. */
  readonly shell: string;
  readonly variables: ReadonlyMap<string, string>;
  readonly environment: readonly EnvironmentEntry[];
  readonly commands: ReadonlyMap<string, readonly string[]>;
  /** Declaration order. */
  readonly trees: readonly Tree[];
  readonly groups: readonly Group[];
  readonly gardens: readonly Garden[];
}

export interface BuildOptions {
  dirname: string;
  sources?: string[];
  /** Overrides `grove.root`. */
  root?: string;
}

const replace = <T>(_base: T, top: T): T => top;

/**
 * Merges two named sections. A key keeps the position where it first
 * appeared; `combine` decides its value when both sides have it.
 */
function mergeMaps<T>(
  base: Map<string, T> | undefined,
  top: Map<string, T> | undefined,
  combine: (base: T, top: T) => T = replace
): Map<string, T> | undefined {
  if (!base) return top;
  if (!top) return base;
  const merged = new Map(base);
  for (const [key, value] of top) {
    const existing = merged.get(key);
    merged.set(key, existing === undefined ? value : combine(existing, value));
  }
  return merged;
}

function mergeTreeDocuments(base: TreeDocument, top: TreeDocument): TreeDocument {
  return {
    ...base,
    ...top,
    variables: mergeMaps(base.variables, top.variables),
    environment: mergeMaps(base.environment, top.environment),
    commands: mergeMaps(base.commands, top.commands)
  };
}

function mergeGardenDocuments(base: GardenDocument, top: GardenDocument): GardenDocument {
  return {
    ...base,
    ...top,
    variables: mergeMaps(base.variables, top.variables),
    environment: mergeMaps(base.environment, top.environment),
    commands: mergeMaps(base.commands, top.commands)
  };
}

/**
 * Layers configuration documents, lowest precedence first.
 *
 * Scalars are last-wins; sections merge key by key; trees and gardens
 * merge their own sections key by key. A key keeps the position where it
 * first appeared.
 */
export function mergeDocuments(documents: readonly ConfigDocument[]): ConfigDocument {
  const merged: ConfigDocument = {};

  for (const doc of documents) {
    if (doc.grove) {
      merged.grove = { ...merged.grove, ...doc.grove };
    }
    merged.variables = mergeMaps(merged.variables, doc.variables);
    merged.environment = mergeMaps(merged.environment, doc.environment);
    merged.commands = mergeMaps(merged.commands, doc.commands);
    merged.templates = mergeMaps(merged.templates, doc.templates);
    merged.groups = mergeMaps(merged.groups, doc.groups);
    merged.trees = mergeMaps<TreeDocument>(merged.trees, doc.trees, mergeTreeDocuments);
    merged.gardens = mergeMaps<GardenDocument>(merged.gardens, doc.gardens, mergeGardenDocuments);
  }

  return merged;
}

/**
 * Flattens a template and everything it extends into one document, bases
 * first.
 */
function flattenTemplate(
  name: string,
  templates: ReadonlyMap<string, TemplateDocument>,
  visiting: string[] = []
): TemplateDocument {
  if (visiting.includes(name)) {
    throw new ConfigurationError(`template cycle: ${[...visiting, name].join(' -> ')}`);
  }
  const template = templates.get(name);
  if (!template) {
    throw new ConfigurationError(`unknown template '${name}'`);
  }

  let result: TemplateDocument = {};
  for (const base of template.extend ?? []) {
    result = mergeTemplate(result, flattenTemplate(base, templates, [...visiting, name]));
  }
  return mergeTemplate(result, template);
}

function mergeTemplate(base: TemplateDocument, top: TemplateDocument): TemplateDocument {
  return {
    shell: top.shell ?? base.shell,
    variables: mergeMaps(base.variables, top.variables),
    environment: mergeMaps(base.environment, top.environment),
    commands: mergeMaps(base.commands, top.commands)
  };
}

function buildTree(name: string, doc: TreeDocument, templates: ReadonlyMap<string, TemplateDocument>): Tree {
  let inherited: TemplateDocument = {};
  for (const templateName of doc.templates ?? []) {
    inherited = mergeTemplate(inherited, flattenTemplate(templateName, templates));
  }

  return Object.freeze({
    name,
    path: doc.path ?? name,
    url: doc.url,
    description: doc.description,
    shell: doc.shell ?? inherited.shell,
    variables: new Map<string, string>(mergeMaps(inherited.variables, doc.variables)),
    environment: Object.freeze(toEnvironmentEntries(mergeMaps(inherited.environment, doc.environment) ?? [])),
    commands: new Map<string, readonly string[]>(mergeMaps(inherited.commands, doc.commands))
  });
}

function buildGarden(name: string, doc: GardenDocument): Garden {
  return Object.freeze({
    name,
    trees: Object.freeze([...(doc.trees ?? [])]),
    groups: Object.freeze([...(doc.groups ?? [])]),
    variables: new Map<string, string>(doc.variables),
    environment: Object.freeze(toEnvironmentEntries(doc.environment ?? [])),
    commands: new Map<string, readonly string[]>(doc.commands)
  });
}

export function buildConfiguration(doc: ConfigDocument, options: BuildOptions): Configuration {
  const templates = doc.templates ?? new Map<string, TemplateDocument>();
  const treeDocs = doc.trees ?? new Map<string, TreeDocument>();
  const groupDocs = doc.groups ?? new Map<string, string[]>();

  for (const name of groupDocs.keys()) {
    if (treeDocs.has(name)) {
      throw new ConfigurationError(`'${name}' is defined as both a tree and a group`);
    }
  }

  const trees = [...treeDocs].map(([name, tree]) => buildTree(name, tree, templates));
  const groups = [...groupDocs].map(([name, members]): Group =>
    Object.freeze({ name, members: Object.freeze([...members]) })
  );
  const gardens = [...(doc.gardens ?? [])].map(([name, garden]) => buildGarden(name, garden));

  return Object.freeze({
    dirname: options.dirname,
    sources: Object.freeze([...(options.sources ?? [])]),
    root: options.root ?? doc.grove?.root ?? DEFAULT_ROOT,
    shell: doc.grove?.shell ?? DEFAULT_SHELL,
    variables: new Map<string, string>(doc.variables),
    environment: Object.freeze(toEnvironmentEntries(doc.environment ?? [])),
    commands: new Map<string, readonly string[]>(doc.commands),
    trees: Object.freeze(trees),
    groups: Object.freeze(groups),
    gardens: Object.freeze(gardens)
  });
}

export function findTree(config: Configuration, name: string): Tree | undefined {
  return config.trees.find(tree => tree.name === name);
}

export function findGroup(config: Configuration, name: string): Group | undefined {
  return config.groups.find(group => group.name === name);
}

export function findGarden(config: Configuration, name: string): Garden | undefined {
  return config.gardens.find(garden => garden.name === name);
}
