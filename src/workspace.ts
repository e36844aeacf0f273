import { isAbsolute, resolve, sep } from 'path';
import { applyEnvironment } from './environment.js';
import { execaShellExecutor, type ShellExecutor } from './exec.js';
import { parseTemplate } from './expression.js';
import type { Configuration, Garden, Tree } from './model.js';
import { VariableResolver } from './resolver.js';
import { Scope, expressionLayer, literalLayer, type ScopeLayer } from './scope.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/errors.js';

export const BUILTIN = {
  CONFIG_DIR: 'GROVE_CONFIG_DIR',
  ROOT: 'GROVE_ROOT',
  TREE_NAME: 'TREE_NAME',
  TREE_PATH: 'TREE_PATH'
} as const;

export interface WorkspaceOptions {
  executor?: ShellExecutor;
  /** Ambient environment: the outermost scope layer and the base of every tree environment. */
  env?: Record<string, string | undefined>;
  /** `--define name=value` values; they shadow global and tree variables. */
  overrides?: Record<string, string>;
  /** Aborts `$ command` expressions that are still running. */
  signal?: AbortSignal;
}

/**
 * Everything one invocation resolves against a configuration.
 *
 * Scopes, tree paths and variable values are computed on first use and kept
 * for the lifetime of the workspace, which is one run.
 */
export class Workspace {
  readonly config: Configuration;
  readonly resolver: VariableResolver;
  private readonly env: Record<string, string>;
  private readonly processLayer: ScopeLayer;
  private readonly globalLayer: ScopeLayer;
  private readonly overrideLayer: ScopeLayer;
  private rootPromise?: Promise<string>;
  private globalPromise?: Promise<Scope>;
  private readonly treeLayers = new Map<string, ScopeLayer>();
  private readonly gardenLayers = new Map<string, ScopeLayer>();
  private readonly paths = new Map<string, Promise<string>>();
  private readonly scopes = new Map<string, Promise<Scope>>();

  constructor(config: Configuration, options: WorkspaceOptions = {}) {
    this.config = config;
    this.env = definedEntries(options.env ?? process.env);
    this.resolver = new VariableResolver({
      executor: options.executor ?? execaShellExecutor,
      env: this.env,
      signal: options.signal
    });
    this.processLayer = literalLayer('process', 'environment', this.env);
    this.globalLayer = expressionLayer('global', 'variables', config.variables);
    this.overrideLayer = expressionLayer('override', 'defines', Object.entries(options.overrides ?? {}));
  }

  /** `GROVE_ROOT`: `grove.root` evaluated in global scope, absolute against the config directory. */
  rootPath(): Promise<string> {
    if (!this.rootPromise) {
      this.rootPromise = (async () => {
        const bootstrap = new Scope('root', [
          this.processLayer,
          this.globalLayer,
          this.overrideLayer,
          this.builtins({})
        ]);
        const value = await this.resolver.evaluate(this.config.root, bootstrap);
        return resolve(this.config.dirname, value);
      })();
    }
    return this.rootPromise;
  }

  globalScope(): Promise<Scope> {
    if (!this.globalPromise) {
      this.globalPromise = (async () => new Scope('global', [
        this.processLayer,
        this.globalLayer,
        this.overrideLayer,
        this.builtins({ [BUILTIN.ROOT]: await this.rootPath() })
      ]))();
    }
    return this.globalPromise;
  }

  /**
   * Absolute path of a tree. The path expression sees the tree's variables
   * and `TREE_NAME` but not `TREE_PATH`; relative results are taken from
   * `GROVE_ROOT`.
   */
  treePath(tree: Tree): Promise<string> {
    let path = this.paths.get(tree.name);
    if (!path) {
      path = (async () => {
        const root = await this.rootPath();
        const scope = this.treeChain(`tree:${tree.name}:path`, tree, {
          [BUILTIN.ROOT]: root,
          [BUILTIN.TREE_NAME]: tree.name
        });
        const value = await this.resolver.evaluate(tree.path, scope);
        return isAbsolute(value) ? value : resolve(root, value);
      })();
      this.paths.set(tree.name, path);
    }
    return path;
  }

  /**
   * Scope of a tree. With a garden, the garden's variables sit between the
   * global and the tree's own.
   */
  treeScope(tree: Tree, garden?: Garden): Promise<Scope> {
    const id = garden ? `garden:${garden.name}:tree:${tree.name}` : `tree:${tree.name}`;
    let scope = this.scopes.get(id);
    if (!scope) {
      scope = (async () => this.treeChain(id, tree, {
        [BUILTIN.ROOT]: await this.rootPath(),
        [BUILTIN.TREE_NAME]: tree.name,
        [BUILTIN.TREE_PATH]: await this.treePath(tree)
      }, garden))();
      this.scopes.set(id, scope);
    }
    return scope;
  }

  /** The ambient environment with the global, the tree's, then the garden's entries applied. */
  async environment(tree: Tree, garden?: Garden): Promise<Record<string, string>> {
    const scope = await this.treeScope(tree, garden);
    return applyEnvironment(
      this.env,
      [...this.config.environment, ...tree.environment, ...(garden?.environment ?? [])],
      expression => this.resolver.evaluate(expression, scope)
    );
  }

  /**
   * Interpolated script bodies of a named command: the tree's own, else the
   * global one, followed by the garden's. `undefined` when none defines it.
   * References that no scope defines are left for the shell.
   */
  async commandScripts(tree: Tree, name: string, garden?: Garden): Promise<string[] | undefined> {
    const own = tree.commands.get(name) ?? this.config.commands.get(name);
    const appended = garden?.commands.get(name);
    if (!own && !appended) {
      return undefined;
    }
    const scripts = [...(own ?? []), ...(appended ?? [])];
    const scope = await this.treeScope(tree, garden);
    const result: string[] = [];
    for (const script of scripts) {
      result.push(await this.interpolateScript(script, scope));
    }
    return result;
  }

  interpolateScript(script: string, scope: Scope): Promise<string> {
    return this.resolver.evaluate(parseTemplate(script), scope, { undefinedReferences: 'preserve' });
  }

  /** Interpreter for a tree's commands. */
  shellFor(tree: Tree): string {
    return tree.shell ?? this.config.shell;
  }

  /**
   * Tree whose path contains `cwd`, the deepest one when trees nest.
   * Trees whose path cannot be resolved are reported and passed over.
   */
  async currentTree(cwd: string): Promise<Tree | undefined> {
    let best: { tree: Tree; path: string } | undefined;
    for (const tree of this.config.trees) {
      let path: string;
      try {
        path = await this.treePath(tree);
      } catch (error) {
        ui.warning(`cannot resolve the path of ${tree.name}: ${ErrorUtils.extractErrorMessage(error)}`);
        continue;
      }
      const contains = cwd === path || cwd.startsWith(path.endsWith(sep) ? path : path + sep);
      if (contains && (!best || path.length > best.path.length)) {
        best = { tree, path };
      }
    }
    return best?.tree;
  }

  private treeLayer(tree: Tree): ScopeLayer {
    let layer = this.treeLayers.get(tree.name);
    if (!layer) {
      layer = expressionLayer('tree', tree.name, tree.variables);
      this.treeLayers.set(tree.name, layer);
    }
    return layer;
  }

  private gardenLayer(garden: Garden): ScopeLayer {
    let layer = this.gardenLayers.get(garden.name);
    if (!layer) {
      layer = expressionLayer('garden', garden.name, garden.variables);
      this.gardenLayers.set(garden.name, layer);
    }
    return layer;
  }

  private treeChain(id: string, tree: Tree, builtins: Record<string, string>, garden?: Garden): Scope {
    return new Scope(id, [
      this.processLayer,
      this.globalLayer,
      ...(garden ? [this.gardenLayer(garden)] : []),
      this.treeLayer(tree),
      this.overrideLayer,
      this.builtins(builtins)
    ]);
  }

  private builtins(values: Record<string, string>): ScopeLayer {
    return literalLayer('builtin', 'builtins', {
      [BUILTIN.CONFIG_DIR]: this.config.dirname,
      ...values
    });
  }
}

function definedEntries(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[name] = value;
    }
  }
  return result;
}
