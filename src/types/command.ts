/**
 * A structured command ready for execution.
 * Backends never build shell strings; they produce argv arrays.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Record<string, string>;
}
