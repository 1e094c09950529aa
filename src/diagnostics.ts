/**
 * Diagnostics
 * Line-tagged error records and the sinks that receive them
 */

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/** A single line-tagged fault reported by the scanner or the parser */
export interface Diagnostic {
  readonly errorId: string;
  /** 1-based source line */
  readonly line: number;
  /** Location suffix: '', ' at end', or " at '<lexeme>'" */
  readonly where: string;
  readonly message: string;
}

/** Sink for diagnostics. Called synchronously, in source order. */
export interface DiagnosticReporter {
  report(diagnostic: Diagnostic): void;
}

/** Reporter that keeps every diagnostic in memory */
export interface CollectingReporter extends DiagnosticReporter {
  readonly diagnostics: readonly Diagnostic[];
  readonly hadError: boolean;
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a diagnostic as `[line <N>] Error<where>: <message>`.
 *
 * @example
 * formatDiagnostic({ errorId: 'TERN-P001', line: 2, where: ' at end', message: 'Expect expression.' })
 * // '[line 2] Error at end: Expect expression.'
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `[line ${diagnostic.line}] Error${diagnostic.where}: ${diagnostic.message}`;
}

// ============================================================
// REPORTERS
// ============================================================

/** Default sink: one formatted line per diagnostic on stderr */
export function createConsoleReporter(
  write: (line: string) => void = (line) => console.error(line)
): DiagnosticReporter {
  return {
    report(diagnostic) {
      write(formatDiagnostic(diagnostic));
    },
  };
}

export function createCollectingReporter(): CollectingReporter {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    get hadError() {
      return diagnostics.length > 0;
    },
    report(diagnostic) {
      diagnostics.push(diagnostic);
    },
  };
}
