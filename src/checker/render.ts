/**
 * Renders arguments and thrown values for failure messages.
 *
 * @packageDocumentation
 */

import { inspect } from 'node:util';

/**
 * Renders one argument on a single line.
 *
 * Errors render as `Name: message` rather than with their stack.
 *
 * @example
 * renderArgument(null);          // 'null'
 * renderArgument('x');           // "'x'"
 * renderArgument(new Error('a')); // 'Error: a'
 */
export function renderArgument(value: unknown): string {
  if (value instanceof Error) {
    return String(value);
  }
  return inspect(value, { depth: 2, breakLength: Infinity });
}

export function renderArguments(args: readonly unknown[]): string[] {
  return args.map(renderArgument);
}

/**
 * Renders a thrown value, which need not be an Error.
 */
export function renderCause(cause: unknown): string {
  return cause instanceof Error ? String(cause) : inspect(cause, { breakLength: Infinity });
}
