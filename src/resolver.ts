import { CircularVariableReferenceError, UndefinedVariableError } from './errors.js';
import { evaluateExpression, parseExpression, type EvaluationContext, type Expression } from './expression.js';
import type { ShellExecutor } from './exec.js';
import type { Scope } from './scope.js';
import { ui } from './ui.js';

/**
 * Command expressions always run through `sh`, whatever interpreter the
 * configuration picks for dispatched commands.
 */
export const EXPRESSION_SHELL = 'sh';

export interface ResolverOptions {
  /** Interpreter for `$ command` expressions; `sh` when omitted. */
  shell?: string;
  executor: ShellExecutor;
  /** Environment handed to `$ command` expressions; the process environment when omitted. */
  env?: Record<string, string>;
  /** Stops a running `$ command` expression. */
  signal?: AbortSignal;
}

export interface EvaluateOptions {
  undefinedReferences?: 'error' | 'preserve';
}

/**
 * Lazy, memoised variable resolution for one run.
 *
 * Values are cached per (variable, scope) pair, so a `$ command` variable
 * runs at most once for each scope that looks it up. Each top-level request
 * carries an explicit stack of the variables being resolved; finding a name
 * already on the stack is a cycle. Requests against the same scope are
 * queued so the cache and the stack are never observed half-way through
 * another request. Different scopes resolve independently.
 */
export class VariableResolver {
  private readonly options: ResolverOptions;
  private readonly caches = new Map<Scope, Map<string, string>>();
  private readonly queues = new Map<Scope, Promise<unknown>>();

  constructor(options: ResolverOptions) {
    this.options = options;
  }

  /** Resolves `name` in `scope`, failing with `UndefinedVariableError` when no layer defines it. */
  resolve(name: string, scope: Scope): Promise<string> {
    return this.serialize(scope, async () => {
      const value = await this.lookup(name, scope, []);
      if (value === undefined) {
        throw new UndefinedVariableError(name, scope.id);
      }
      return value;
    });
  }

  /** Resolves `name` when it is defined; `undefined` otherwise. */
  tryResolve(name: string, scope: Scope): Promise<string | undefined> {
    return this.serialize(scope, () => this.lookup(name, scope, []));
  }

  evaluate(expression: Expression | string, scope: Scope, options: EvaluateOptions = {}): Promise<string> {
    const parsed = typeof expression === 'string' ? parseExpression(expression) : expression;
    return this.serialize(scope, () =>
      evaluateExpression(parsed, this.context(scope, [], options))
    );
  }

  /**
   * Flat mapping of every configured variable visible from `scope`. The
   * ambient process environment is left out.
   */
  resolveAll(scope: Scope): Promise<Record<string, string>> {
    return this.serialize(scope, async () => {
      const values: Record<string, string> = {};
      for (const name of scope.names(['process'])) {
        const value = await this.lookup(name, scope, []);
        if (value !== undefined) {
          values[name] = value;
        }
      }
      return values;
    });
  }

  private async lookup(name: string, scope: Scope, stack: string[]): Promise<string | undefined> {
    const cache = this.cacheFor(scope);
    const cached = cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const entry = scope.lookup(name);
    if (!entry) {
      return undefined;
    }

    const start = stack.indexOf(name);
    if (start !== -1) {
      throw new CircularVariableReferenceError([...stack.slice(start), name], scope.id);
    }

    stack.push(name);
    try {
      const value = await evaluateExpression(entry.expression, this.context(scope, stack, {}));
      ui.debug('eval', `${scope.id}: ${name} = ${value}`);
      cache.set(name, value);
      return value;
    } finally {
      stack.pop();
    }
  }

  private context(scope: Scope, stack: string[], options: EvaluateOptions): EvaluationContext {
    return {
      scope: scope.id,
      lookup: (name) => this.lookup(name, scope, stack),
      shell: this.options.shell ?? EXPRESSION_SHELL,
      executor: this.options.executor,
      env: this.options.env,
      signal: this.options.signal,
      undefinedReferences: options.undefinedReferences
    };
  }

  private cacheFor(scope: Scope): Map<string, string> {
    let cache = this.caches.get(scope);
    if (!cache) {
      cache = new Map();
      this.caches.set(scope, cache);
    }
    return cache;
  }

  private serialize<T>(scope: Scope, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(scope) ?? Promise.resolve();
    const next = previous.then(task);
    // the queue only orders work; failures reach the caller through `next`
    this.queues.set(scope, next.catch(() => undefined));
    return next;
  }
}
