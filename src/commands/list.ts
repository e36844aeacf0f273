import fs from 'fs-extra';
import { selectTrees, type AppContext } from '../app.js';

export interface TreeListing {
  name: string;
  path: string;
  exists: boolean;
  url?: string;
  description?: string;
}

/** `grove ls [query]` lists the selected trees with their resolved paths. */
export async function list(app: AppContext, query: string): Promise<TreeListing[]> {
  const trees = await selectTrees(app, query);
  const listings: TreeListing[] = [];
  for (const tree of trees) {
    const path = await app.workspace.treePath(tree);
    listings.push({
      name: tree.name,
      path,
      exists: await fs.pathExists(path),
      url: tree.url,
      description: tree.description
    });
  }
  return listings;
}
