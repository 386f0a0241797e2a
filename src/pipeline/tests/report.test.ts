import { describe, expect, it } from 'vitest';

import { ProjectionError } from '../../errors';
import { type Diagnostic, diagnostic } from '../../types/diagnostics';
import { createProjectionCompiler } from '../compiler';
import { formatDiagnostic, formatDiagnostics } from '../report';
import { renderStandalone } from '../standalone';
import { commerceSchema } from './fixtures';

/**
 * Test suite: diagnostic reports and standalone rendering.
 */
describe('Report', () => {
  const unresolved = diagnostic('UnresolvedType', 'The type of field "extra" could not be determined.', {
    field: 'extra',
    lineage: 'Order.extra'
  });
  const ambiguous = diagnostic('AmbiguousReversePath', 'Field "amount" is left out of the inverse.', {
    field: 'amount'
  });
  const empty = diagnostic('EmptyStructure', 'The shape "Order" has no resolvable fields.');

  describe('formatDiagnostic', () => {
    it('prefers the lineage over the field name', () => {
      expect(formatDiagnostic(unresolved)).toBe(
        'warning UnresolvedType at "Order.extra": The type of field "extra" could not be determined.'
      );
      expect(formatDiagnostic(ambiguous)).toBe(
        'info AmbiguousReversePath at "amount": Field "amount" is left out of the inverse.'
      );
      expect(formatDiagnostic(empty)).toBe(
        'error EmptyStructure: The shape "Order" has no resolvable fields.'
      );
    });
  });

  describe('formatDiagnostics', () => {
    it('reports an empty list', () => {
      expect(formatDiagnostics([], { subject: 'orders.ts:3:7' })).toBe(
        '[projection] orders.ts:3:7: no diagnostics'
      );
    });

    it('counts by severity and adds hints once per code', () => {
      expect(formatDiagnostics([ambiguous, unresolved, empty, unresolved])).toBe(
        [
          '[projection] projection: 4 diagnostics (error=1, warning=2, info=1)',
          '  info AmbiguousReversePath at "amount": Field "amount" is left out of the inverse.',
          '  warning UnresolvedType at "Order.extra": The type of field "extra" could not be determined.',
          '  error EmptyStructure: The shape "Order" has no resolvable fields.',
          '  warning UnresolvedType at "Order.extra": The type of field "extra" could not be determined.',
          'Hint: declare the member in the type schema, or declare the type of each captured variable the shape reads.',
          'Hint: a shape needs at least one field whose value resolves.'
        ].join('\n')
      );
    });

    it('truncates long lists', () => {
      const many: Diagnostic[] = [ambiguous, ambiguous, ambiguous];

      expect(formatDiagnostics(many, { maxPreviewDiagnostics: 1 })).toBe(
        [
          '[projection] projection: 3 diagnostics (info=3)',
          '  info AmbiguousReversePath at "amount": Field "amount" is left out of the inverse.',
          '  … (2 more)'
        ].join('\n')
      );
    });
  });

  describe('renderStandalone', () => {
    const compiler = createProjectionCompiler(commerceSchema);

    it('joins helpers, inverses and the forward reference', () => {
      const result = compiler.compile({
        sourceType: 'Order',
        shape: 'o => ({ count: o.lines.count() })'
      });
      if (!result.success) throw new Error('expected the call site to compile');

      expect(renderStandalone(result)).toBe(
        [
          ...result.helpers,
          `function ${result.reverse.functionName}(dto, entity = {}) {\n  return entity;\n}`,
          `return { forward: o => ({\n  count: __count(o.lines)\n}), reverse: ${result.reverse.functionName} };`
        ].join('\n')
      );
    });

    it('refuses failed results', () => {
      const result = compiler.compile({ sourceType: 'Order', shape: 'o => ({})' });

      expect(() => renderStandalone(result)).toThrow(ProjectionError);
      expect(() => renderStandalone(result)).toThrow(
        '[projection] Cannot render a failed projection.\n[projection] projection: 1 diagnostic (error=1)'
      );
    });
  });
});
