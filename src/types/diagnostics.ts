/**
 * Field-level and call-site-level issues recorded while compiling a shape.
 *
 * Diagnostics are data, not exceptions: every code listed here recovers
 * locally. The one fatal condition (`IdentityCollision`) is raised as
 * `IdentityCollisionError` instead.
 */
export type DiagnosticCode =
  /** Field type could not be determined; the field passes through as `unknown`. */
  | 'UnresolvedType'
  /** Construct not recognized; treated as an opaque leaf or skipped. */
  | 'UnsupportedExpressionShape'
  /** No unique member path back into the source; omitted from the inverse. */
  | 'AmbiguousReversePath'
  /** The shape resolved to zero fields; emission aborted for the call site. */
  | 'EmptyStructure'
  /** A target name already names a different shape; declared under a hash-suffixed name. */
  | 'TypeNameConflict';

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export type Diagnostic = {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;

  /**
   * Best-effort lineage of the offending field
   * (e.g. `Order.customer.address.city`).
   */
  lineage?: string;

  /**
   * Target field name, when the issue is field-local.
   */
  field?: string;
};

export function diagnostic(
  code: DiagnosticCode,
  message: string,
  details: Omit<Diagnostic, 'code' | 'message' | 'severity'> & {
    severity?: DiagnosticSeverity;
  } = {}
): Diagnostic {
  const { severity, ...rest } = details;
  return {
    code,
    severity: severity ?? DEFAULT_SEVERITY[code],
    message,
    ...rest
  };
}

const DEFAULT_SEVERITY: Record<DiagnosticCode, DiagnosticSeverity> = {
  UnresolvedType: 'warning',
  UnsupportedExpressionShape: 'warning',
  AmbiguousReversePath: 'info',
  EmptyStructure: 'error',
  TypeNameConflict: 'warning'
};
