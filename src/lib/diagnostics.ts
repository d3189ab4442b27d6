/**
 * Diagnostics Accumulator
 *
 * Collects the non-fatal events of a pipeline run: lines that could not be
 * parsed, competitors that could not be attributed to an owner, and results
 * worth a manual look (overtime wins, fallback grammar matches).
 *
 * A collector is created per run (or per stage) and passed explicitly.
 * Stages that run independently, such as one weight class of the bracket
 * tracker, get their own collector which the caller merges back with
 * `merge()`. Nothing here is process-wide.
 */

export type DiagnosticKind =
  | 'unparsed-line'
  | 'fallback-pattern'
  | 'sudden-victory'
  | 'tie-breaker'
  | 'unknown-placement'
  | 'missing-weight-class'
  | 'watch-list-match'
  | 'ambiguous-competitor'
  | 'unmatched-competitor'
  | 'weight-mismatch'
  | 'round-out-of-order'
  | 'repeat-placement'
  | 'match-after-placement'
  | 'conflicting-claim'
  | 'roster-entry-unseen';

export type DiagnosticSeverity = 'info' | 'warning';

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  message: string;
  lineNumber?: number;
  rawText?: string;
  details?: Record<string, unknown>;
}

export interface DiagnosticsReport {
  entries: Diagnostic[];
  counts: Partial<Record<DiagnosticKind, number>>;
  /** Distinct win phrases found in the transcript, sorted */
  winPhrases: string[];
}

/** Severity used when a caller does not pass one */
const DEFAULT_SEVERITY: Record<DiagnosticKind, DiagnosticSeverity> = {
  'unparsed-line': 'warning',
  'fallback-pattern': 'info',
  'sudden-victory': 'info',
  'tie-breaker': 'info',
  'unknown-placement': 'warning',
  'missing-weight-class': 'warning',
  'watch-list-match': 'info',
  'ambiguous-competitor': 'warning',
  'unmatched-competitor': 'info',
  'weight-mismatch': 'warning',
  'round-out-of-order': 'warning',
  'repeat-placement': 'warning',
  'match-after-placement': 'warning',
  'conflicting-claim': 'warning',
  'roster-entry-unseen': 'info',
};

export class DiagnosticsCollector {
  private readonly entries: Diagnostic[] = [];
  private readonly seen = new Set<string>();

  add(
    kind: DiagnosticKind,
    message: string,
    context: Omit<Diagnostic, 'kind' | 'message' | 'severity'> & { severity?: DiagnosticSeverity } = {}
  ): void {
    const { severity, ...rest } = context;
    this.entries.push({
      kind,
      severity: severity ?? DEFAULT_SEVERITY[kind],
      message,
      ...rest,
    });
  }

  /**
   * Records a diagnostic only the first time `dedupeKey` is seen for this kind.
   * Used for per-identity events such as an unmatched competitor who appears
   * in several matches.
   */
  addOnce(
    kind: DiagnosticKind,
    dedupeKey: string,
    message: string,
    context: Omit<Diagnostic, 'kind' | 'message' | 'severity'> & { severity?: DiagnosticSeverity } = {}
  ): void {
    const key = `${kind}:${dedupeKey}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.add(kind, message, context);
  }

  /** Appends another collector's entries, keeping its dedupe keys */
  merge(other: DiagnosticsCollector): void {
    for (const entry of other.entries) {
      this.entries.push(entry);
    }
    for (const key of other.seen) {
      this.seen.add(key);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  list(kind?: DiagnosticKind): Diagnostic[] {
    return kind ? this.entries.filter((entry) => entry.kind === kind) : [...this.entries];
  }

  report(winPhrases: string[] = []): DiagnosticsReport {
    const counts: Partial<Record<DiagnosticKind, number>> = {};
    for (const entry of this.entries) {
      counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    }
    return { entries: [...this.entries], counts, winPhrases };
  }
}
