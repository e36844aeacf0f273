import { Command, CommanderError } from 'commander';
import fs from 'fs-extra';
import { resolve } from 'path';
import { createApp, type AppEnvironment, type GlobalOptions } from './app.js';
import { cmd, custom } from './commands/cmd.js';
import { evaluate } from './commands/eval.js';
import { exec } from './commands/exec.js';
import { init } from './commands/init.js';
import { list } from './commands/list.js';
import { ExitCode, GroveError, UserCancelledError } from './errors.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/errors.js';

// src/cli.ts when run from source, dist/src/cli.js once built
const PACKAGE_JSON_CANDIDATES = ['../package.json', '../../package.json'];

function readVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const url = new URL(candidate, import.meta.url);
    if (!fs.pathExistsSync(url.pathname)) continue;
    try {
      const pkg: unknown = fs.readJsonSync(url.pathname);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch (error) {
      ui.debug('cli', `cannot read ${url.pathname}: ${ErrorUtils.extractErrorMessage(error)}`);
    }
  }
  return '0.0.0';
}

/**
 * Arguments after the first `--` are handed verbatim to every script, so
 * they are split off before commander sees them.
 */
export function splitOnDash(argv: readonly string[]): { head: string[]; tail: string[] } {
  const index = argv.indexOf('--');
  if (index === -1) {
    return { head: [...argv], tail: [] };
  }
  return { head: argv.slice(0, index), tail: argv.slice(index + 1) };
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];
const increase = (_value: string, previous: number): number => previous + 1;

/**
 * Builds the `grove` program. Actions report their exit status through
 * `setExitCode`; `args` are the arguments found after `--`.
 */
export function createProgram(
  environment: AppEnvironment,
  args: readonly string[],
  setExitCode: (code: number) => void
): Command {
  const program = new Command();

  const open = () => createApp(program.opts<GlobalOptions>(), environment);

  program
    .name('grove')
    .description('Run commands across a collection of source trees')
    .version(readVersion(), '-V, --version')
    .option('-c, --config <file>', 'configuration file; repeat to layer files', collect, [])
    .option('-C, --chdir <dir>', 'run as if started in <dir>')
    .option('-D, --define <name=value>', 'override a variable; repeatable', collect, [])
    .option('-r, --root <dir>', 'override grove.root')
    .option('-v, --verbose', 'be verbose; repeat for more', increase, 0)
    .option('-q, --quiet', 'do not print tree headers', false)
    .option('-k, --keep-going', 'continue with the next tree after a failure', false)
    .option('-b, --breadth-first', 'run each command over every tree before the next command', false)
    .option('--strict', 'fail when a query term matches no tree or group', false)
    .exitOverride()
    .hook('preAction', () => {
      const options = program.opts<GlobalOptions>();
      ui.setVerbosity(options.verbose);
      ui.setQuiet(options.quiet);
    });

  program
    .command('cmd')
    .description('run named commands over the trees selected by a query')
    .argument('<query>', 'trees and groups to run in')
    .argument('<commands...>', 'commands to run')
    .action(async (query: string, commands: string[]) => {
      const outcome = await cmd(await open(), query, commands, args);
      setExitCode(outcome.exitCode);
    });

  program
    .command('exec')
    .description('run a script in every tree selected by a query')
    .argument('<query>', 'trees and groups to run in')
    .argument('<script...>', 'script to run')
    .action(async (query: string, script: string[]) => {
      const outcome = await exec(await open(), query, script, args);
      setExitCode(outcome.exitCode);
    });

  program
    .command('eval')
    .description('evaluate an expression in global scope or in a tree')
    .argument('<expression>', 'expression to evaluate')
    .argument('[tree]', 'tree whose scope to use')
    .action(async (expression: string, tree: string | undefined) => {
      console.log(await evaluate(await open(), expression, tree));
    });

  program
    .command('ls')
    .alias('list')
    .description('list trees with their paths')
    .argument('[query...]', 'trees and groups to list', ['*'])
    .action(async (query: string[]) => {
      for (const item of await list(await open(), query.join(' '))) {
        ui.treeListItem(item.name, item.path, item.exists);
      }
    });

  program
    .command('init')
    .description('write grove.yaml from the git repositories below a directory')
    .argument('[dir]', 'directory to search and write into', '.')
    .option('-f, --force', 'overwrite an existing grove.yaml', false)
    .action(async (dir: string, options: { force: boolean }) => {
      const { chdir } = program.opts<GlobalOptions>();
      const cwd = chdir ? resolve(environment.cwd, chdir) : environment.cwd;
      await init(resolve(cwd, dir), options);
    });

  program
    .argument('[command]', 'custom command to run')
    .argument('[queries...]', 'trees and groups to run in (default: the current tree)')
    .action(async (command: string | undefined, queries: string[]) => {
      if (!command) {
        program.outputHelp();
        setExitCode(ExitCode.USAGE);
        return;
      }
      setExitCode(await custom(await open(), command, queries, args));
    });

  return program;
}

/** Runs the CLI and returns the process exit code. Never throws. */
export async function runCli(argv: readonly string[], environment: AppEnvironment): Promise<number> {
  const { head, tail } = splitOnDash(argv);
  let exitCode: number = ExitCode.OK;
  const program = createProgram(environment, tail, code => { exitCode = code; });

  try {
    await program.parseAsync(head, { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof UserCancelledError) {
      ui.userCancelled();
      return error.exitCode;
    }
    ui.error(`❌ ${ErrorUtils.extractErrorMessage(error)}`);
    return error instanceof GroveError ? error.exitCode : ExitCode.SOFTWARE;
  }
}
