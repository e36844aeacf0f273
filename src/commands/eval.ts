import { findTreeOrFail, type AppContext } from '../app.js';

/**
 * `grove eval <expression> [tree]`
 *
 * Evaluates an expression in global scope, or in a tree's scope when a tree
 * is named.
 */
export async function evaluate(app: AppContext, expression: string, treeName?: string): Promise<string> {
  const { workspace } = app;
  const scope = treeName
    ? await workspace.treeScope(findTreeOrFail(app, treeName))
    : await workspace.globalScope();
  return workspace.resolver.evaluate(expression, scope);
}
