import fs from 'fs-extra';
import { isAbsolute, join, relative } from 'path';
import { stringify } from 'yaml';
import { ExitCode, GroveError } from '../errors.js';
import { getInitSelections, type InitSelections } from '../prompts.js';
import { ui } from '../ui.js';

export const DEFAULT_CONFIG_NAME = 'grove.yaml';

/**
 * Builds the configuration document for a set of picked trees. Paths inside
 * `configDir` are written relative to it and left out when they equal the
 * tree name.
 */
export function buildInitDocument(selections: InitSelections, configDir: string): Record<string, unknown> {
  // Map: numeric-looking names keep their order
  const trees = new Map<string, Record<string, string>>();
  for (const pick of selections.trees) {
    const rel = relative(configDir, pick.path);
    const tree: Record<string, string> = {};
    if (rel === '') {
      tree.path = '.';
    } else if (rel.startsWith('..') || isAbsolute(rel)) {
      tree.path = pick.path;
    } else if (rel !== pick.name) {
      tree.path = rel;
    }
    if (pick.url) {
      tree.url = pick.url;
    }
    trees.set(pick.name, tree);
  }

  const doc: Record<string, unknown> = {
    grove: { root: '${GROVE_CONFIG_DIR}' },
    trees
  };
  if (selections.group) {
    doc.groups = { [selections.group]: selections.trees.map(pick => pick.name) };
  }
  return doc;
}

/**
 * `grove init [dir]` writes `grove.yaml` into `dir` from an interactive
 * selection of the repositories found below it.
 */
export async function init(dir: string, options: { force?: boolean } = {}): Promise<string> {
  const target = join(dir, DEFAULT_CONFIG_NAME);
  if (!options.force && await fs.pathExists(target)) {
    throw new GroveError(`${target} already exists (use --force to overwrite)`, ExitCode.USAGE);
  }

  const selections = await getInitSelections(dir);
  await fs.ensureDir(dir);
  await fs.writeFile(target, stringify(buildInitDocument(selections, dir)));

  ui.success(`✓ Wrote ${target} with ${selections.trees.length} tree(s)`);
  return target;
}
