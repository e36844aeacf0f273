import { describe, test, expect } from 'vitest';
import {
  compileMatcher,
  expandGarden,
  expandGroup,
  parseQuery,
  parseTerm,
  resolveContexts,
  resolveQuery,
  usesCurrentTree
} from '../src/query.js';
import { CircularGroupReferenceError, UnknownSelectorError } from '../src/errors.js';
import type { Tree, TreeContext } from '../src/model.js';
import { configFromYaml } from './utils/index.js';

const names = (trees: Tree[]) => trees.map(tree => tree.name);
const placed = (contexts: TreeContext[]) => contexts.map(({ tree, garden }) => `${tree.name}@${garden?.name ?? '-'}`);

const greek = configFromYaml(`
trees:
  alpha:
  beta:
  gamma:
`);

const services = configFromYaml(`
trees:
  api: {}
  db: {}
  web: {}
groups:
  backend: [api, db]
  everything: ['*']
  stack: [web, backend]
`);

describe('parseTerm', () => {
  test('recognises prefixes', () => {
    expect(parseTerm('!%backend')).toEqual({ text: '!%backend', exclude: true, target: 'group', pattern: 'backend' });
    expect(parseTerm(':api')).toEqual({ text: ':api', exclude: false, target: 'tree', pattern: 'api' });
    expect(parseTerm('@dev')).toEqual({ text: '@dev', exclude: false, target: 'garden', pattern: 'dev' });
    expect(parseTerm('.')).toEqual({ text: '.', exclude: false, target: 'current', pattern: '.' });
    expect(parseTerm('a*')).toEqual({ text: 'a*', exclude: false, target: 'any', pattern: 'a*' });
  });

  test('parseQuery splits on whitespace and drops empty terms', () => {
    expect(parseQuery('  api   !db ').terms.map(term => term.text)).toEqual(['api', '!db']);
    expect(parseQuery('!').terms).toEqual([]);
  });

  test('usesCurrentTree spots a dot term', () => {
    expect(usesCurrentTree(parseQuery('api !.'))).toBe(true);
    expect(usesCurrentTree(parseQuery('api db'))).toBe(false);
  });
});

describe('compileMatcher', () => {
  test('names without glob characters match exactly', () => {
    const match = compileMatcher('api');
    expect(match('api')).toBe(true);
    expect(match('api2')).toBe(false);
  });

  test('globs match with shell semantics', () => {
    expect(compileMatcher('a?i')('api')).toBe(true);
    expect(compileMatcher('[ad]*')('db')).toBe(true);
    expect(compileMatcher('[ad]*')('web')).toBe(false);
  });
});

describe('resolveQuery', () => {
  test('lists numeric-looking tree names in declaration order', () => {
    const config = configFromYaml('trees: {web: {}, "2024": {}, "10": {}}\ngroups:\n  "7": ["10", web]\n');

    expect(names(resolveQuery(config, '*'))).toEqual(['web', '2024', '10']);
    expect(names(resolveQuery(config, '%7'))).toEqual(['web', '10']);
  });

  test('exclusions apply after inclusions, wherever they appear', () => {
    expect(names(resolveQuery(greek, '* !beta'))).toEqual(['alpha', 'gamma']);
    expect(names(resolveQuery(greek, '!beta *'))).toEqual(['alpha', 'gamma']);
  });

  test('groups expand to their members and can be excluded from', () => {
    expect(names(resolveQuery(services, 'backend !db'))).toEqual(['api']);
    expect(names(resolveQuery(services, '* !backend'))).toEqual(['web']);
  });

  test('results follow declaration order and list each tree once', () => {
    expect(names(resolveQuery(services, 'web backend api'))).toEqual(['api', 'db', 'web']);
  });

  test('a term matching nothing selects nothing unless strict', () => {
    expect(resolveQuery(greek, 'nosuch*')).toEqual([]);
    expect(() => resolveQuery(greek, 'nosuch*', { strict: true })).toThrow(UnknownSelectorError);
    expect(() => resolveQuery(greek, 'nosuch*', { strict: true })).toThrow("'nosuch*' does not match any tree or group");
  });

  test('strict mode ignores exclusions that match nothing', () => {
    expect(names(resolveQuery(greek, 'alpha !nosuch', { strict: true }))).toEqual(['alpha']);
  });

  test('% restricts a term to groups and : to trees', () => {
    expect(names(resolveQuery(services, '%backend'))).toEqual(['api', 'db']);
    expect(resolveQuery(services, ':backend')).toEqual([]);
    expect(names(resolveQuery(services, ':a*'))).toEqual(['api']);
  });

  test('nested groups expand recursively', () => {
    expect(names(resolveQuery(services, 'stack'))).toEqual(['api', 'db', 'web']);
  });

  test('. selects the current tree, when there is one', () => {
    expect(names(resolveQuery(services, '.', { currentTree: 'db' }))).toEqual(['db']);
    expect(resolveQuery(services, '.')).toEqual([]);
    expect(names(resolveQuery(services, '* !.', { currentTree: 'api' }))).toEqual(['db', 'web']);
  });
});

describe('gardens', () => {
  const config = configFromYaml(`
trees:
  api: {}
  db: {}
  web: {}
  docs: {}
groups:
  backend: [api, db]
gardens:
  dev:
    trees: [web]
    groups: [backend]
  writing:
    trees: 'd*'
`);

  test('a garden expands to its trees and the trees of its groups', () => {
    expect(names(expandGarden(config, 'dev'))).toEqual(['api', 'db', 'web']);
    expect(names(expandGarden(config, 'writing'))).toEqual(['db', 'docs']);
    expect(expandGarden(config, 'nosuch')).toEqual([]);
  });

  test('@ selects gardens and keeps the garden with each tree', () => {
    expect(placed(resolveContexts(config, '@dev'))).toEqual(['api@dev', 'db@dev', 'web@dev']);
    expect(placed(resolveContexts(config, '@dev !db'))).toEqual(['api@dev', 'web@dev']);
  });

  test('a tree keeps the garden of the first term that selected it', () => {
    expect(placed(resolveContexts(config, '@*'))).toEqual(['api@dev', 'db@dev', 'web@dev', 'docs@writing']);
    expect(placed(resolveContexts(config, 'web @dev'))).toEqual(['api@dev', 'db@dev', 'web@-']);
  });

  test('plain terms do not match gardens', () => {
    expect(resolveQuery(config, 'dev')).toEqual([]);
    expect(() => resolveQuery(config, '@nosuch', { strict: true })).toThrow(UnknownSelectorError);
  });
});

describe('expandGroup', () => {
  test('a group globbing over everything does not include itself', () => {
    expect(names(expandGroup(services, 'everything'))).toEqual(['api', 'db', 'web']);
  });

  test('an unknown group expands to nothing', () => {
    expect(expandGroup(services, 'nosuch')).toEqual([]);
  });

  test('groups naming each other are reported as a cycle', () => {
    const config = configFromYaml(`
trees:
  api: {}
groups:
  x: [api, y]
  y: [x]
`);
    expect(() => expandGroup(config, 'x')).toThrow(CircularGroupReferenceError);
    expect(() => resolveQuery(config, 'x')).toThrow('circular group reference x -> y -> x');
  });

  test('a group naming itself is a cycle', () => {
    const config = configFromYaml(`
groups:
  loop: [loop]
`);
    expect(() => expandGroup(config, 'loop')).toThrow('circular group reference loop -> loop');
  });
});
