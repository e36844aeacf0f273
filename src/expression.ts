import { CommandExpressionFailedError, UndefinedVariableError } from './errors.js';
import type { ShellExecutor } from './exec.js';

/**
 * Configuration values are expressions. Three forms are recognised:
 *
 * - literal text: `main`
 * - interpolation: `${TREE_PATH}/bin` (any number of `${name}` references)
 * - command: `$ git describe --tags` (stdout of the command, after the
 *   command text itself has been interpolated)
 *
 * `$${` escapes a literal `${`.
 */
export type TemplatePart =
  | { type: 'text'; value: string }
  | { type: 'ref'; name: string; raw: string };

export type Expression =
  | { kind: 'literal'; raw: string; text: string }
  | { kind: 'interpolation'; raw: string; parts: readonly TemplatePart[] }
  | { kind: 'command'; raw: string; body: Expression };

const COMMAND_PREFIX = '$ ';
const REFERENCE = /\$\$\{|\$\{([^}]*)\}/g;

export function literal(text: string): Expression {
  return { kind: 'literal', raw: text, text };
}

/**
 * Parses text as a template only. A leading `$ ` has no special meaning,
 * which is what command bodies need.
 */
export function parseTemplate(raw: string): Expression {
  const parts: TemplatePart[] = [];
  let text = '';
  let last = 0;

  for (const match of raw.matchAll(REFERENCE)) {
    const index = match.index ?? 0;
    text += raw.slice(last, index);
    last = index + match[0].length;

    const name = match[1];
    if (name === undefined) {
      // $${ escape
      text += '${';
      continue;
    }
    if (text) {
      parts.push({ type: 'text', value: text });
      text = '';
    }
    parts.push({ type: 'ref', name: name.trim(), raw: match[0] });
  }
  text += raw.slice(last);

  if (!parts.some(part => part.type === 'ref')) {
    return { kind: 'literal', raw, text };
  }
  if (text) {
    parts.push({ type: 'text', value: text });
  }
  return { kind: 'interpolation', raw, parts };
}

export function parseExpression(raw: string): Expression {
  if (raw.startsWith(COMMAND_PREFIX)) {
    return { kind: 'command', raw, body: parseTemplate(raw.slice(COMMAND_PREFIX.length)) };
  }
  return parseTemplate(raw);
}

export interface EvaluationContext {
  /** Id of the scope chain, reported in errors. */
  scope: string;
  /** Resolves a referenced name; `undefined` when no scope layer defines it. */
  lookup: (name: string) => Promise<string | undefined>;
  /** Interpreter used for command expressions. */
  shell: string;
  executor: ShellExecutor;
  /** Environment handed to command expressions. */
  env?: Record<string, string>;
  signal?: AbortSignal;
  /**
   * `error` (default) fails on unknown references; `preserve` leaves the
   * `${name}` text in place for a shell to expand later.
   */
  undefinedReferences?: 'error' | 'preserve';
}

export function stripTrailingNewlines(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}

export async function evaluateExpression(
  expression: Expression,
  context: EvaluationContext
): Promise<string> {
  switch (expression.kind) {
    case 'literal':
      return expression.text;

    case 'interpolation': {
      let result = '';
      for (const part of expression.parts) {
        if (part.type === 'text') {
          result += part.value;
          continue;
        }
        const value = await context.lookup(part.name);
        if (value === undefined) {
          if (context.undefinedReferences === 'preserve') {
            result += part.raw;
            continue;
          }
          throw new UndefinedVariableError(part.name, context.scope);
        }
        result += value;
      }
      return result;
    }

    case 'command': {
      const command = await evaluateExpression(expression.body, context);
      const outcome = await context.executor({
        shell: context.shell,
        command,
        env: context.env,
        signal: context.signal
      });
      if (!outcome.ok) {
        throw new CommandExpressionFailedError(command, outcome.exitCode, outcome.stderr, context.scope);
      }
      return stripTrailingNewlines(outcome.stdout);
    }
  }
}
