import { selectContexts, type AppContext } from '../app.js';
import { dispatch, type DispatchOutcome } from '../dispatch.js';
import { ExitCode } from '../errors.js';
import { ui } from '../ui.js';

/**
 * `grove cmd <query> <command>... [-- args]`
 *
 * Runs named commands over the trees selected by one query.
 */
export async function cmd(
  app: AppContext,
  query: string,
  commands: readonly string[],
  args: readonly string[]
): Promise<DispatchOutcome> {
  const contexts = await selectContexts(app, query);
  ui.debug('cmd', `query '${query}' selected ${contexts.length} tree(s): ${contexts.map(({ tree }) => tree.name).join(' ')}`);

  return dispatch(
    app.workspace,
    contexts,
    commands.map(name => ({ kind: 'named' as const, name })),
    {
      keepGoing: app.options.keepGoing,
      breadthFirst: app.options.breadthFirst,
      args,
      signal: app.signal,
      runner: app.runner
    }
  );
}

/**
 * `grove <command> [query...] [-- args]`
 *
 * Runs one named command over each query in turn, defaulting to the tree
 * containing the working directory. Returns the last non-zero status.
 */
export async function custom(
  app: AppContext,
  command: string,
  queries: readonly string[],
  args: readonly string[]
): Promise<number> {
  let exitCode: number = ExitCode.OK;
  for (const query of queries.length > 0 ? queries : ['.']) {
    const outcome = await cmd(app, query, [command], args);
    if (outcome.cancelled) {
      return outcome.exitCode;
    }
    if (outcome.exitCode !== ExitCode.OK) {
      exitCode = outcome.exitCode;
      if (!app.options.keepGoing) {
        break;
      }
    }
  }
  return exitCode;
}
