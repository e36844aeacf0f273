import { execa } from 'execa';

/**
 * Subprocess boundary. Everything that spawns a process goes through one of
 * the two interfaces below so the resolver and dispatcher can be exercised
 * with in-process fakes.
 */

export type ShellOutcome =
  | { ok: true; stdout: string }
  | { ok: false; exitCode: number; stderr: string };

export interface ShellRequest {
  shell: string;
  command: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

/** Runs a command expression: command text in, stdout or failure out. */
export type ShellExecutor = (request: ShellRequest) => Promise<ShellOutcome>;

export interface ScriptInvocation {
  shell: string;
  script: string;
  /** `$0` of the script. */
  arg0: string;
  args: readonly string[];
  cwd: string;
  env: Record<string, string>;
  signal?: AbortSignal;
}

export interface ScriptResult {
  exitCode: number;
  cancelled: boolean;
}

/** Runs a dispatched command script with inherited stdio. */
export type ScriptRunner = (invocation: ScriptInvocation) => Promise<ScriptResult>;

/** Exit status reported when a process could not be started or was killed. */
const SPAWN_FAILURE = 127;

export const execaShellExecutor: ShellExecutor = async ({ shell, command, env, signal }) => {
  const result = await execa(shell, ['-c', command], {
    reject: false,
    stripFinalNewline: false,
    shell: false,
    stdin: 'ignore',
    env,
    extendEnv: env === undefined,
    cancelSignal: signal
  });

  if (result.failed) {
    return {
      ok: false,
      exitCode: result.exitCode ?? SPAWN_FAILURE,
      stderr: typeof result.stderr === 'string' ? result.stderr : ''
    };
  }
  return { ok: true, stdout: typeof result.stdout === 'string' ? result.stdout : '' };
};

export const execaScriptRunner: ScriptRunner = async (invocation) => {
  const result = await execa(
    invocation.shell,
    ['-c', invocation.script, invocation.arg0, ...invocation.args],
    {
      cwd: invocation.cwd,
      env: invocation.env,
      extendEnv: false,
      stdio: 'inherit',
      reject: false,
      shell: false,
      cancelSignal: invocation.signal
    }
  );

  return {
    exitCode: result.exitCode ?? SPAWN_FAILURE,
    cancelled: result.isCanceled
  };
};
