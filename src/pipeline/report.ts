import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity
} from '../types/diagnostics';

/**
 * Severity & user actionability
 * -----------------------------
 * Diagnostics never stop a session; they describe what a call site lost.
 *
 * - `error` (`EmptyStructure`): the call site produced no code at all.
 * - `warning` (`UnresolvedType`, `UnsupportedExpressionShape`): a field was
 *   kept as an opaque `unknown` pass-through, or skipped.
 * - `warning` (`TypeNameConflict`): a target type was declared under a
 *   hash-suffixed name.
 * - `info` (`AmbiguousReversePath`): the forward code is complete; the field
 *   is missing from the inverse only.
 *
 * Hints are attached only where the fix lives in user input (the type
 * schema, the capture declarations, the shape itself).
 */

export type DiagnosticReportOptions = {
  /**
   * Display name of the call site (e.g. `src/orders.ts:12:4`).
   * Used in the header line.
   */
  subject?: string;

  /**
   * Maximum number of diagnostics listed individually.
   * @default 10
   */
  maxPreviewDiagnostics?: number;
};

const SEVERITY_ORDER: readonly DiagnosticSeverity[] = ['error', 'warning', 'info'];

/**
 * Formats diagnostics for a build log.
 *
 * @returns Multi-line report, e.g.
 *          ```
 *          [projection] src/orders.ts:12:4: 2 diagnostics (warning=1, info=1)
 *            warning UnresolvedType at "Order.total": ...
 *            info AmbiguousReversePath at "Order.lines": ...
 *          Hint: ...
 *          ```
 */
export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  options: DiagnosticReportOptions = {}
): string {
  const subject = options.subject ?? 'projection';

  // Nothing to report
  if (diagnostics.length === 0) return `[projection] ${subject}: no diagnostics`;

  const count = diagnostics.length === 1 ? '1 diagnostic' : `${diagnostics.length} diagnostics`;
  const lines = [
    `[projection] ${subject}: ${count} (${formatSeverityDistribution(diagnostics)})`
  ];

  const limit = options.maxPreviewDiagnostics ?? 10;
  for (const entry of diagnostics.slice(0, Math.max(limit, 0))) {
    lines.push(`  ${formatDiagnostic(entry)}`);
  }

  // Truncation indicator
  if (diagnostics.length > limit) {
    lines.push(`  … (${diagnostics.length - Math.max(limit, 0)} more)`);
  }

  const codes = new Set(diagnostics.map(entry => entry.code));
  for (const code of codes) {
    const hint = formatHint(code);
    if (hint) lines.push(hint);
  }

  return lines.join('\n');
}

/**
 * `warning UnresolvedType at "Order.total": message`
 */
export function formatDiagnostic(entry: Diagnostic): string {
  const location = entry.lineage ?? entry.field;
  const at = location ? ` at "${location}"` : '';
  return `${entry.severity} ${entry.code}${at}: ${entry.message}`;
}

/**
 * Counts per severity, most severe first (e.g. "error=1, warning=2").
 */
function formatSeverityDistribution(diagnostics: readonly Diagnostic[]): string {
  const countBySeverity = new Map<DiagnosticSeverity, number>();

  for (const entry of diagnostics) {
    countBySeverity.set(entry.severity, (countBySeverity.get(entry.severity) ?? 0) + 1);
  }

  return SEVERITY_ORDER.flatMap(severity => {
    const total = countBySeverity.get(severity);
    return total ? [`${severity}=${total}`] : [];
  }).join(', ');
}

function formatHint(code: DiagnosticCode): string | undefined {
  switch (code) {
    case 'UnresolvedType':
      return (
        'Hint: declare the member in the type schema, or declare the type ' +
        'of each captured variable the shape reads.'
      );

    case 'EmptyStructure':
      return 'Hint: a shape needs at least one field whose value resolves.';

    case 'TypeNameConflict':
      return 'Hint: give structurally different shapes different target names.';

    // covers UnsupportedExpressionShape and AmbiguousReversePath
    default:
      return undefined;
  }
}
