export type EnvironmentMode = 'set' | 'prepend' | 'append';

export interface EnvironmentEntry {
  /** Variable name without the mode suffix. */
  name: string;
  mode: EnvironmentMode;
  /** Raw expressions, applied in order. */
  values: readonly string[];
}

export const PATH_SEPARATOR = ':';

/**
 * Splits a configured environment key into name and mode:
 * `NAME=` sets, `NAME+` appends, a bare `NAME` prepends.
 */
export function parseEnvironmentName(key: string): { name: string; mode: EnvironmentMode } {
  if (key.endsWith('=')) {
    return { name: key.slice(0, -1), mode: 'set' };
  }
  if (key.endsWith('+')) {
    return { name: key.slice(0, -1), mode: 'append' };
  }
  return { name: key, mode: 'prepend' };
}

/** Entries in the order the keys were written. */
export function toEnvironmentEntries(values: Iterable<readonly [string, readonly string[]]>): EnvironmentEntry[] {
  return [...values].map(([key, list]) => ({ ...parseEnvironmentName(key), values: list }));
}

export function mergeValue(mode: EnvironmentMode, inherited: string | undefined, value: string): string {
  if (mode === 'set' || !inherited) {
    return value;
  }
  return mode === 'prepend'
    ? `${value}${PATH_SEPARATOR}${inherited}`
    : `${inherited}${PATH_SEPARATOR}${value}`;
}

/**
 * Applies entries on top of `base`, each relative to the value it inherits
 * from the entries before it or from `base`. `base` is not modified.
 */
export async function applyEnvironment(
  base: Readonly<Record<string, string>>,
  entries: readonly EnvironmentEntry[],
  evaluate: (expression: string) => Promise<string>
): Promise<Record<string, string>> {
  const env: Record<string, string> = { ...base };
  for (const entry of entries) {
    for (const expression of entry.values) {
      const value = await evaluate(expression);
      env[entry.name] = mergeValue(entry.mode, env[entry.name], value);
    }
  }
  return env;
}
