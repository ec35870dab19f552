/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional tree location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `ACL300`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when the parser recorded one. */
  line?: number;
  /** 1-based column number, when the parser recorded one. */
  column?: number;
  /** Structural path of the offending node, e.g. `$[0].body[2].value`. */
  path?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'ACL000',

  /** Failed to read the input tree from disk. */
  IoReadFailed: 'ACL001',

  /** Input is not valid JSON or a node has a malformed field. */
  TreeParseError: 'ACL100',

  /** A node kind or operator has no lowering rule. */
  UnsupportedConstruct: 'ACL300',

  /** Call to a defined function with the wrong number of arguments. */
  ArityMismatch: 'ACL301',

  /** Two top-level functions share a name. */
  DuplicateFunction: 'ACL302',

  /** Requested entry function is missing or takes parameters. */
  EntryError: 'ACL303',

  /** Assembler or linker exited with a non-zero status. */
  ToolchainFailure: 'ACL600',

  /** Assembler or linker could not be started. */
  ToolchainUnavailable: 'ACL601',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
