import { selectContexts, type AppContext } from '../app.js';
import { dispatch, type DispatchOutcome } from '../dispatch.js';

/** `grove exec <query> <script>...` runs an ad-hoc script in every selected tree. */
export async function exec(
  app: AppContext,
  query: string,
  words: readonly string[],
  args: readonly string[]
): Promise<DispatchOutcome> {
  const contexts = await selectContexts(app, query);
  return dispatch(app.workspace, contexts, [{ kind: 'script', script: words.join(' ') }], {
    keepGoing: app.options.keepGoing,
    args,
    signal: app.signal,
    runner: app.runner
  });
}
