import { ProjectionError } from '../errors';
import { formatDiagnostics } from './report';
import type { CompileResult } from './result';

/**
 * Renders a compiled call site as one self-contained function body:
 * runtime helpers, inverse declarations, the prebuilt declaration (if any),
 * then `return { forward, reverse };`.
 *
 * The body evaluates with `new Function(body)()` and needs nothing from the
 * enclosing scope unless the shape reads captured variables.
 *
 * @throws ProjectionError for a failed result
 */
export function renderStandalone(result: CompileResult): string {
  if (!result.success) {
    throw new ProjectionError(
      `Cannot render a failed projection.\n${formatDiagnostics(result.diagnostics)}`
    );
  }

  const parts = [...result.helpers, ...result.reverse.declarations];
  if (result.forward.declaration) parts.push(result.forward.declaration);
  parts.push(
    `return { forward: ${result.forward.reference}, reverse: ${result.reverse.functionName} };`
  );

  return parts.join('\n');
}
