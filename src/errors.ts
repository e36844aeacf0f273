/**
 * Error taxonomy for configuration resolution, tree selection and dispatch.
 *
 * Every error carries the names needed to reproduce the failure (variable,
 * scope, group, tree) so a user can act on the message alone.
 */

/** Exit codes borrowed from sysexits.h */
export const ExitCode = {
  OK: 0,
  USAGE: 64,
  DATAERR: 65,
  SOFTWARE: 70,
  IOERR: 74,
  CONFIG: 78,
  INTERRUPTED: 130
} as const;

export class GroveError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = ExitCode.SOFTWARE) {
    super(message);
    this.name = 'GroveError';
    this.exitCode = exitCode;
  }
}

/**
 * Base class for failures while evaluating an expression or variable.
 * `scope` is the id of the scope chain the evaluation ran in.
 */
export class EvaluationError extends GroveError {
  readonly scope: string;

  constructor(message: string, scope: string) {
    super(message, ExitCode.DATAERR);
    this.name = 'EvaluationError';
    this.scope = scope;
  }
}

export class UndefinedVariableError extends EvaluationError {
  readonly variable: string;

  constructor(variable: string, scope: string) {
    super(`undefined variable '${variable}' in scope '${scope}'`, scope);
    this.name = 'UndefinedVariableError';
    this.variable = variable;
  }
}

/**
 * Raised when resolving a variable requires resolving itself again.
 *
 * @example
 * ```typescript
 * // variables: { a: '${b}', b: '${a}' }
 * err.cycle;   // ['a', 'b', 'a']
 * err.message; // "circular variable reference a -> b -> a in scope 'tree:api'"
 * ```
 */
export class CircularVariableReferenceError extends EvaluationError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[], scope: string) {
    super(`circular variable reference ${cycle.join(' -> ')} in scope '${scope}'`, scope);
    this.name = 'CircularVariableReferenceError';
    this.cycle = cycle;
  }
}

export class CommandExpressionFailedError extends EvaluationError {
  readonly command: string;
  readonly status: number;
  readonly stderr: string;

  constructor(command: string, status: number, stderr: string, scope: string) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
    super(`command expression '${command}' exited with status ${status} in scope '${scope}'${detail}`, scope);
    this.name = 'CommandExpressionFailedError';
    this.command = command;
    this.status = status;
    this.stderr = stderr;
  }
}

export class CircularGroupReferenceError extends GroveError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`circular group reference ${cycle.join(' -> ')}`, ExitCode.CONFIG);
    this.name = 'CircularGroupReferenceError';
    this.cycle = cycle;
  }
}

/** Strict-mode only: an inclusion term selected nothing. */
export class UnknownSelectorError extends GroveError {
  readonly term: string;

  constructor(term: string) {
    super(`'${term}' does not match any tree or group`, ExitCode.USAGE);
    this.name = 'UnknownSelectorError';
    this.term = term;
  }
}

export class TreeCommandFailedError extends GroveError {
  readonly tree: string;
  readonly command: string;
  readonly status: number;

  constructor(tree: string, command: string, status: number) {
    super(`command '${command}' failed in tree '${tree}' with status ${status}`, status);
    this.name = 'TreeCommandFailedError';
    this.tree = tree;
    this.command = command;
    this.status = status;
  }
}

export class ConfigurationError extends GroveError {
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${source}: ${message}` : message, ExitCode.CONFIG);
    this.name = 'ConfigurationError';
    this.source = source;
  }
}

/**
 * Custom error class for user-initiated cancellation events.
 *
 * Thrown when the user cancels an interactive prompt through Ctrl+C, ESC
 * or by declining the final confirmation.
 */
export class UserCancelledError extends GroveError {
  constructor(message = 'Operation cancelled by user') {
    super(message, ExitCode.OK);
    this.name = 'UserCancelledError';
  }
}
