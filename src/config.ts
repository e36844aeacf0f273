import fs from 'fs-extra';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from './errors.js';
import { buildConfiguration, mergeDocuments, type Configuration } from './model.js';
import { configDocumentSchema, type ConfigDocument } from './schema.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/errors.js';

export const CONFIG_FILE_NAMES = ['grove.yaml', 'grove.yml', 'grove.json'];

export interface LoadOptions {
  /** Explicit configuration files, lowest precedence first. */
  files?: string[];
  cwd?: string;
  /** Consulted for `GROVE_CONFIG` and `GROVE_CONFIG_DIR`. */
  env?: Record<string, string | undefined>;
  home?: string;
  /** Overrides `grove.root`. */
  root?: string;
}

/**
 * Directories searched for a configuration file, in priority order:
 * `.`, `./grove`, `./etc/grove`, `~/.config/grove`, `~/etc/grove`, `/etc/grove`.
 */
export function searchPath(cwd: string, home: string): string[] {
  return [
    cwd,
    join(cwd, 'grove'),
    join(cwd, 'etc', 'grove'),
    join(home, '.config', 'grove'),
    join(home, 'etc', 'grove'),
    '/etc/grove'
  ];
}

export async function findConfigFile(cwd: string, home: string): Promise<string | undefined> {
  for (const dir of searchPath(cwd, home)) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = join(dir, name);
      if (await fs.pathExists(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

/**
 * Parses and validates one configuration file. JSON goes through the YAML
 * parser as well, so mappings from either format arrive as `Map`s in
 * written order.
 */
export function parseConfigText(text: string, source: string): ConfigDocument {
  let raw: unknown;
  try {
    raw = parseYaml(text, { mapAsMap: true });
  } catch (error) {
    throw new ConfigurationError(`cannot parse: ${ErrorUtils.extractErrorMessage(error)}`, source);
  }

  // an empty file is an empty configuration
  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new ConfigurationError(`invalid configuration at ${where}: ${issue.message}`, source);
  }
  return result.data;
}

/**
 * Reads a file and the files it includes. Included documents come first so
 * the including file overrides them. Each file is read at most once.
 */
async function readLayers(path: string, seen: Set<string>): Promise<{ path: string; doc: ConfigDocument }[]> {
  const absolute = resolve(path);
  if (seen.has(absolute)) {
    ui.debug('config', `skipping already included ${absolute}`);
    return [];
  }
  seen.add(absolute);

  let text: string;
  try {
    text = await fs.readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`cannot read: ${ErrorUtils.extractErrorMessage(error)}`, absolute);
  }

  const doc = parseConfigText(text, absolute);
  const layers: { path: string; doc: ConfigDocument }[] = [];
  for (const include of doc.grove?.includes ?? []) {
    layers.push(...await readLayers(resolve(dirname(absolute), include), seen));
  }
  layers.push({ path: absolute, doc });
  return layers;
}

/**
 * Discovers, reads, validates and merges the configuration for one run.
 *
 * Without any file the result is an empty configuration rooted at `cwd`,
 * which is still enough to evaluate expressions.
 */
export async function loadConfiguration(options: LoadOptions = {}): Promise<Configuration> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let files = (options.files ?? []).map(file => resolve(cwd, file));
  if (files.length === 0 && env.GROVE_CONFIG) {
    files = [resolve(cwd, env.GROVE_CONFIG)];
  }
  if (files.length === 0) {
    const found = await findConfigFile(cwd, options.home ?? homedir());
    if (found) {
      files = [found];
    }
  }
  ui.debug('config', files.length > 0 ? `config files: ${files.join(', ')}` : 'no config file found');

  const seen = new Set<string>();
  const layers: { path: string; doc: ConfigDocument }[] = [];
  for (const file of files) {
    layers.push(...await readLayers(file, seen));
  }

  const primary = files[0];
  return buildConfiguration(mergeDocuments(layers.map(layer => layer.doc)), {
    dirname: env.GROVE_CONFIG_DIR ?? (primary ? dirname(primary) : cwd),
    sources: layers.map(layer => layer.path),
    root: options.root
  });
}
