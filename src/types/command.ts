/**
 * A structured command ready for execution.
 * Backends never build raw command strings: they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
  /** Query commands that never change system state; these still run under dry-run. */
  readonly readOnly?: boolean;
}
