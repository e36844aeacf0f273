import { describe, test, expect } from 'vitest';
import { buildConfiguration, findGarden, findGroup, findTree, mergeDocuments, DEFAULT_ROOT, DEFAULT_SHELL } from '../src/model.js';
import { parseConfigText } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { configFromYaml } from './utils/index.js';

describe('parseConfigText', () => {
  test('turns YAML scalars into strings', () => {
    const doc = parseConfigText('variables:\n  port: 8080\n  debug: true\n', 'grove.yaml');
    expect(doc.variables).toEqual(new Map([['port', '8080'], ['debug', 'true']]));
  });

  test('accepts a single command where a list is expected', () => {
    const doc = parseConfigText('commands:\n  build: make\n  test: [make check, make lint]\n', 'grove.yaml');
    expect(doc.commands).toEqual(new Map([['build', ['make']], ['test', ['make check', 'make lint']]]));
  });

  test('a tree given as a string is its URL', () => {
    const doc = parseConfigText('trees:\n  lib: git@example.com:lib.git\n', 'grove.yaml');
    expect(doc.trees).toEqual(new Map([['lib', { url: 'git@example.com:lib.git' }]]));
  });

  test('reads JSON by extension', () => {
    const doc = parseConfigText('{"trees": {"api": {"path": "services/api"}}}', 'grove.json');
    expect(doc.trees).toEqual(new Map([['api', { path: 'services/api' }]]));
  });

  test('keeps numeric-looking names in the order they were written', () => {
    const yaml = parseConfigText('trees:\n  web: {}\n  "2024": {}\n  10: {}\n', 'grove.yaml');
    const json = parseConfigText('{"trees": {"web": {}, "2024": {}, "10": {}}}', 'grove.json');

    expect([...(yaml.trees ?? new Map()).keys()]).toEqual(['web', '2024', '10']);
    expect([...(json.trees ?? new Map()).keys()]).toEqual(['web', '2024', '10']);
  });

  test('an empty file is an empty configuration', () => {
    expect(parseConfigText('', 'grove.yaml')).toEqual({});
  });

  test('reports unknown keys with the file name', () => {
    expect(() => parseConfigText('colour: red\n', '/work/grove.yaml')).toThrow(
      "/work/grove.yaml: invalid configuration at <root>: Unrecognized key(s) in object: 'colour'"
    );
  });

  test('reports where a value has the wrong shape', () => {
    expect(() => parseConfigText('variables:\n  a: [1, 2]\n', 'grove.yaml')).toThrow(
      'grove.yaml: invalid configuration at variables.a'
    );
  });

  test('reports unparsable text as a configuration error', () => {
    expect(() => parseConfigText('trees: [', 'grove.yaml')).toThrow(ConfigurationError);
    expect(() => parseConfigText('{', 'grove.json')).toThrow(/grove\.json: cannot parse/);
  });
});

describe('mergeDocuments', () => {
  test('later documents win key by key, trees merge their sections', () => {
    const merged = mergeDocuments([
      parseConfigText(`
grove:
  shell: bash
variables:
  a: '1'
  b: '1'
trees:
  api:
    path: services/api
    variables:
      p: '1'
`, 'base.yaml'),
      parseConfigText(`
grove:
  root: /srv
variables:
  b: '2'
trees:
  api:
    variables:
      q: '2'
  web: {}
`, 'grove.yaml')
    ]);

    expect(merged.grove).toEqual({ shell: 'bash', root: '/srv' });
    expect(merged.variables).toEqual(new Map([['a', '1'], ['b', '2']]));
    expect([...(merged.trees ?? new Map()).keys()]).toEqual(['api', 'web']);
    expect(merged.trees?.get('api')?.path).toBe('services/api');
    expect(merged.trees?.get('api')?.variables).toEqual(new Map([['p', '1'], ['q', '2']]));
  });

  test('a key keeps the position where it first appeared', () => {
    const merged = mergeDocuments([
      parseConfigText('groups:\n  "3": [a]\n  ops: [b]\n', 'base.yaml'),
      parseConfigText('groups:\n  "1": [c]\n  "3": [d]\n', 'grove.yaml')
    ]);

    expect([...(merged.groups ?? new Map()).entries()]).toEqual([['3', ['d']], ['ops', ['b']], ['1', ['c']]]);
  });
});

describe('buildConfiguration', () => {
  test('fills in defaults', () => {
    const config = configFromYaml('trees:\n  api: {}\n');

    expect(config.shell).toBe(DEFAULT_SHELL);
    expect(config.root).toBe(DEFAULT_ROOT);
    expect(config.dirname).toBe('/work');
    expect(findTree(config, 'api')?.path).toBe('api');
    expect(findTree(config, 'nope')).toBeUndefined();
  });

  test('a root override beats grove.root', () => {
    const doc = parseConfigText('grove:\n  root: /srv\n', 'grove.yaml');
    expect(buildConfiguration(doc, { dirname: '/work' }).root).toBe('/srv');
    expect(buildConfiguration(doc, { dirname: '/work', root: '/elsewhere' }).root).toBe('/elsewhere');
  });

  test('trees inherit from templates, templates from the templates they extend', () => {
    const config = configFromYaml(`
templates:
  base:
    shell: bash
    variables:
      branch: main
    commands:
      build: make
  node:
    extend: base
    environment:
      PATH: \${TREE_PATH}/node_modules/.bin
    commands:
      build: npm run build
      test: npm test
trees:
  api:
    templates: node
    variables:
      port: 8080
  docs:
    path: documentation
    templates: [base]
    commands:
      build: mkdocs build
`);

    const api = findTree(config, 'api');
    expect(api?.shell).toBe('bash');
    expect(api?.variables).toEqual(new Map([['branch', 'main'], ['port', '8080']]));
    expect(api?.commands).toEqual(new Map([['build', ['npm run build']], ['test', ['npm test']]]));
    expect(api?.environment).toEqual([
      { name: 'PATH', mode: 'prepend', values: ['${TREE_PATH}/node_modules/.bin'] }
    ]);

    const docs = findTree(config, 'docs');
    expect(docs?.path).toBe('documentation');
    expect(docs?.commands).toEqual(new Map([['build', ['mkdocs build']]]));
  });

  test('parses environment key suffixes', () => {
    const config = configFromYaml(`
environment:
  PATH: /opt/bin
  GOFLAGS=: -mod=mod
  CFLAGS+: [-O2, -g]
`);
    expect(config.environment).toEqual([
      { name: 'PATH', mode: 'prepend', values: ['/opt/bin'] },
      { name: 'GOFLAGS', mode: 'set', values: ['-mod=mod'] },
      { name: 'CFLAGS', mode: 'append', values: ['-O2', '-g'] }
    ]);
  });

  test('rejects unknown templates and template cycles', () => {
    expect(() => configFromYaml('trees:\n  api:\n    templates: nope\n')).toThrow("unknown template 'nope'");
    expect(() => configFromYaml(`
templates:
  a:
    extend: b
  b:
    extend: a
trees:
  api:
    templates: a
`)).toThrow('template cycle: a -> b -> a');
  });

  test('a name cannot be both a tree and a group', () => {
    expect(() => configFromYaml('trees:\n  api: {}\ngroups:\n  api: [api]\n')).toThrow(
      "'api' is defined as both a tree and a group"
    );
  });

  test('keeps groups in declaration order', () => {
    const config = configFromYaml('groups:\n  b: [x]\n  a: [y, z]\n');
    expect(config.groups.map(group => group.name)).toEqual(['b', 'a']);
    expect(findGroup(config, 'a')?.members).toEqual(['y', 'z']);
  });

  test('keeps numeric-looking tree, group and environment names in declaration order', () => {
    const config = configFromYaml(`
environment:
  Z: z
  "1": one
trees:
  web: {}
  "2024": {}
  "10": {}
groups:
  zeta: [web]
  "7": ["10"]
`);

    expect(config.trees.map(tree => tree.name)).toEqual(['web', '2024', '10']);
    expect(config.groups.map(group => group.name)).toEqual(['zeta', '7']);
    expect(config.environment.map(entry => entry.name)).toEqual(['Z', '1']);
  });

  test('builds gardens with their own variables, environment and commands', () => {
    const config = configFromYaml(`
trees:
  api: {}
gardens:
  dev:
    trees: api
    groups: [backend]
    variables:
      mode: debug
    environment:
      MODE=: \${mode}
    commands:
      build: echo garden
  empty:
`);

    expect(config.gardens.map(garden => garden.name)).toEqual(['dev', 'empty']);
    expect(findGarden(config, 'dev')).toEqual({
      name: 'dev',
      trees: ['api'],
      groups: ['backend'],
      variables: new Map([['mode', 'debug']]),
      environment: [{ name: 'MODE', mode: 'set', values: ['${mode}'] }],
      commands: new Map([['build', ['echo garden']]])
    });
    expect(findGarden(config, 'empty')).toEqual({
      name: 'empty',
      trees: [],
      groups: [],
      variables: new Map(),
      environment: [],
      commands: new Map()
    });
  });

  test('gardens from later documents merge into earlier ones', () => {
    const merged = mergeDocuments([
      parseConfigText('gardens:\n  dev:\n    trees: [api]\n    variables:\n      a: "1"\n', 'base.yaml'),
      parseConfigText('gardens:\n  dev:\n    variables:\n      b: "2"\n', 'grove.yaml')
    ]);

    expect(merged.gardens?.get('dev')).toEqual({ trees: ['api'], variables: new Map([['a', '1'], ['b', '2']]) });
  });
});
