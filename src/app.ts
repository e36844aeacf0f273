import { resolve } from 'path';
import { loadConfiguration } from './config.js';
import { ExitCode, GroveError } from './errors.js';
import type { ScriptRunner, ShellExecutor } from './exec.js';
import { findTree, type Tree, type TreeContext } from './model.js';
import { parseQuery, resolveContexts, usesCurrentTree } from './query.js';
import { Workspace } from './workspace.js';

/** Options shared by every sub-command. */
export type GlobalOptions = {
  config: string[];
  chdir?: string;
  define: string[];
  root?: string;
  verbose: number;
  quiet: boolean;
  strict: boolean;
  keepGoing: boolean;
  breadthFirst: boolean;
};

/** Process-level collaborators, replaceable in tests. */
export interface AppEnvironment {
  cwd: string;
  env: Record<string, string | undefined>;
  executor?: ShellExecutor;
  runner?: ScriptRunner;
  signal?: AbortSignal;
}

export interface AppContext {
  options: GlobalOptions;
  workspace: Workspace;
  /** Working directory after `--chdir`. */
  cwd: string;
  runner?: ScriptRunner;
  signal?: AbortSignal;
}

export function parseDefines(defines: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const define of defines) {
    const index = define.indexOf('=');
    if (index <= 0) {
      throw new GroveError(`invalid --define '${define}': expected name=value`, ExitCode.USAGE);
    }
    values[define.slice(0, index).trim()] = define.slice(index + 1);
  }
  return values;
}

export async function createApp(options: GlobalOptions, environment: AppEnvironment): Promise<AppContext> {
  const cwd = options.chdir ? resolve(environment.cwd, options.chdir) : environment.cwd;
  const config = await loadConfiguration({
    files: options.config,
    cwd,
    env: environment.env,
    root: options.root ? resolve(cwd, options.root) : undefined
  });
  const workspace = new Workspace(config, {
    executor: environment.executor,
    env: environment.env,
    overrides: parseDefines(options.define),
    signal: environment.signal
  });
  return { options, workspace, cwd, runner: environment.runner, signal: environment.signal };
}

/**
 * Resolves a query string into trees and the gardens they were selected
 * through, working out `.` from the working directory when needed.
 */
export async function selectContexts(app: AppContext, text: string): Promise<TreeContext[]> {
  const query = parseQuery(text);
  const current = usesCurrentTree(query) ? await app.workspace.currentTree(app.cwd) : undefined;
  return resolveContexts(app.workspace.config, query, {
    strict: app.options.strict,
    currentTree: current?.name
  });
}

export async function selectTrees(app: AppContext, text: string): Promise<Tree[]> {
  return (await selectContexts(app, text)).map(context => context.tree);
}

export function findTreeOrFail(app: AppContext, name: string): Tree {
  const tree = findTree(app.workspace.config, name);
  if (!tree) {
    throw new GroveError(`unknown tree '${name}'`, ExitCode.USAGE);
  }
  return tree;
}
