import fs from 'fs-extra';
import { ExitCode, TreeCommandFailedError } from './errors.js';
import { execaScriptRunner, type ScriptRunner } from './exec.js';
import type { TreeContext } from './model.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/errors.js';
import type { Workspace } from './workspace.js';

export type TreeStatus = 'ok' | 'failed' | 'error' | 'skipped' | 'cancelled';

export interface TreeResult {
  tree: string;
  /** Garden the tree ran in, when it was selected through one. */
  garden?: string;
  command: string;
  status: TreeStatus;
  exitCode: number;
  error?: Error;
}

export interface DispatchOutcome {
  results: TreeResult[];
  /** 0 when every invocation succeeded or nothing was selected; otherwise the last failing status. */
  exitCode: number;
  cancelled: boolean;
}

/**
 * A unit of work: either a named command from the configuration or an
 * ad-hoc script (`grove exec`).
 */
export type DispatchCommand =
  | { kind: 'named'; name: string }
  | { kind: 'script'; script: string };

export interface DispatchOptions {
  /** Continue with the next tree after a failure. */
  keepGoing?: boolean;
  /** Run each command over every tree before moving to the next command. */
  breadthFirst?: boolean;
  /** Trailing arguments, passed to every script after `$0`. */
  args?: readonly string[];
  /** `$0` of each script. */
  arg0?: string;
  signal?: AbortSignal;
  runner?: ScriptRunner;
}

function commandLabel(command: DispatchCommand): string {
  return command.kind === 'named' ? command.name : command.script;
}

class Dispatcher {
  private readonly workspace: Workspace;
  private readonly options: DispatchOptions;
  private readonly runner: ScriptRunner;
  readonly results: TreeResult[] = [];
  cancelled = false;

  constructor(workspace: Workspace, options: DispatchOptions) {
    this.workspace = workspace;
    this.options = options;
    this.runner = options.runner ?? execaScriptRunner;
  }

  get aborted(): boolean {
    return this.cancelled || this.options.signal?.aborted === true;
  }

  /**
   * Runs one command in one tree and records the result. Returns false when
   * dispatch should stop.
   */
  async run(context: TreeContext, command: DispatchCommand): Promise<boolean> {
    const label = commandLabel(command);
    const result = await this.execute(context, command, label);
    this.results.push(result);

    if (result.status === 'cancelled') {
      this.cancelled = true;
      return false;
    }
    if (result.status === 'failed' || result.status === 'error') {
      ui.error(ErrorUtils.extractErrorMessage(result.error));
      return this.options.keepGoing === true;
    }
    return true;
  }

  private async execute(context: TreeContext, command: DispatchCommand, label: string): Promise<TreeResult> {
    const { tree, garden } = context;
    const base = garden
      ? { tree: tree.name, garden: garden.name, command: label }
      : { tree: tree.name, command: label };

    let path: string;
    let env: Record<string, string>;
    let scripts: string[];
    try {
      path = await this.workspace.treePath(tree);
      if (!(await fs.pathExists(path))) {
        ui.missingTree(tree.name, path);
        return { ...base, status: 'skipped', exitCode: ExitCode.OK };
      }
      env = await this.workspace.environment(tree, garden);
      scripts = await this.scriptsFor(context, command);
    } catch (error) {
      if (this.options.signal?.aborted) {
        return { ...base, status: 'cancelled', exitCode: ExitCode.INTERRUPTED };
      }
      return { ...base, status: 'error', exitCode: ExitCode.SOFTWARE, error: ErrorUtils.toError(error) };
    }

    ui.tree(tree.name, path);
    if (scripts.length === 0) {
      ui.debug('cmd', `${tree.name} has no command '${label}'`);
    }

    for (const script of scripts) {
      ui.command(script);
      const { exitCode, cancelled } = await this.runner({
        shell: this.workspace.shellFor(tree),
        script,
        arg0: this.options.arg0 ?? 'grove',
        args: this.options.args ?? [],
        cwd: path,
        env,
        signal: this.options.signal
      });
      if (cancelled || this.options.signal?.aborted) {
        return { ...base, status: 'cancelled', exitCode: ExitCode.INTERRUPTED };
      }
      if (exitCode !== ExitCode.OK) {
        return {
          ...base,
          status: 'failed',
          exitCode,
          error: new TreeCommandFailedError(tree.name, label, exitCode)
        };
      }
    }
    return { ...base, status: 'ok', exitCode: ExitCode.OK };
  }

  private async scriptsFor({ tree, garden }: TreeContext, command: DispatchCommand): Promise<string[]> {
    if (command.kind === 'named') {
      return (await this.workspace.commandScripts(tree, command.name, garden)) ?? [];
    }
    const scope = await this.workspace.treeScope(tree, garden);
    return [await this.workspace.interpolateScript(command.script, scope)];
  }
}

/**
 * Runs commands over trees, one invocation at a time, in tree order.
 *
 * Depth-first (the default) runs every command in a tree before moving to
 * the next tree. A tree selected through a garden runs with the garden's
 * variables, environment and commands. A tree whose path does not exist is skipped. Without
 * `keepGoing`, dispatch stops at the first failing tree; resolution errors
 * count as failures of that tree only. An aborted signal stops the running
 * script and every tree after it; results gathered so far are returned.
 */
export async function dispatch(
  workspace: Workspace,
  contexts: readonly TreeContext[],
  commands: readonly DispatchCommand[],
  options: DispatchOptions = {}
): Promise<DispatchOutcome> {
  const dispatcher = new Dispatcher(workspace, options);

  if (options.breadthFirst) {
    outer: for (const command of commands) {
      for (const context of contexts) {
        if (dispatcher.aborted) {
          dispatcher.cancelled = true;
          break outer;
        }
        if (!(await dispatcher.run(context, command))) break outer;
      }
    }
  } else {
    outer: for (const context of contexts) {
      for (const command of commands) {
        if (dispatcher.aborted) {
          dispatcher.cancelled = true;
          break outer;
        }
        if (!(await dispatcher.run(context, command))) break outer;
      }
    }
  }

  return summarize(dispatcher.results, dispatcher.cancelled);
}

export function summarize(results: TreeResult[], cancelled: boolean): DispatchOutcome {
  let exitCode: number = ExitCode.OK;
  for (const result of results) {
    if (result.exitCode !== ExitCode.OK) {
      exitCode = result.exitCode;
    }
  }
  if (cancelled) {
    exitCode = ExitCode.INTERRUPTED;
  }
  return { results, exitCode, cancelled };
}
