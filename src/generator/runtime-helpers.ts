import type { GroupingMembers } from '../schema';
import type { AggregateOperator } from '../parser/combinators';
import { member, identifier, print } from './builders';

export type RuntimeHelper = 'flatMap' | 'groupBy' | AggregateOperator;

const HELPER_ORDER: readonly RuntimeHelper[] = [
  'flatMap',
  'groupBy',
  'count',
  'sum',
  'average',
  'min',
  'max',
  'first',
  'last',
  'firstOrDefault',
  'lastOrDefault',
  'any',
  'all'
];

export function helperName(helper: RuntimeHelper): string {
  return `__${helper}`;
}

/**
 * Helpers referenced while lowering one call site.
 */
export class HelperRegistry {
  private readonly used = new Set<RuntimeHelper>();

  use(helper: RuntimeHelper): string {
    this.used.add(helper);
    return helperName(helper);
  }

  /**
   * Declarations of the used helpers, in a fixed order.
   */
  declarations(grouping: GroupingMembers): string[] {
    return HELPER_ORDER.filter(helper => this.used.has(helper)).map(helper =>
      helperSource(helper, grouping)
    );
  }
}

/**
 * Source text of a runtime helper. Every helper takes any iterable.
 */
export function helperSource(
  helper: RuntimeHelper,
  grouping: GroupingMembers
): string {
  const name = helperName(helper);

  switch (helper) {
    case 'flatMap':
      return [
        `function ${name}(source, selector) {`,
        '  const result = [];',
        '  for (const element of source) {',
        '    const selected = selector(element);',
        "    if (selected != null && typeof selected !== 'string' && typeof selected[Symbol.iterator] === 'function') {",
        '      for (const inner of selected) result.push(inner);',
        '    } else {',
        '      result.push(selected);',
        '    }',
        '  }',
        '  return result;',
        '}'
      ].join('\n');

    case 'groupBy': {
      const key = print(member(identifier('group'), grouping.keyMember));
      const items = print(member(identifier('group'), grouping.elementsMember));
      return [
        `function ${name}(source, keySelector) {`,
        '  const groups = new Map();',
        '  for (const element of source) {',
        '    const key = keySelector(element);',
        '    const id = __groupKey(key);',
        '    let group = groups.get(id);',
        '    if (group === undefined) {',
        '      group = {};',
        `      ${key} = key;`,
        `      ${items} = [];`,
        '      groups.set(id, group);',
        '    }',
        `    ${items}.push(element);`,
        '  }',
        '  return Array.from(groups.values());',
        '}',
        '',
        'function __groupKey(key) {',
        "  if (key === null || typeof key !== 'object') return key;",
        "  return JSON.stringify(key, (_, value) => typeof value === 'bigint' ? { bigint: String(value) } : value);",
        '}'
      ].join('\n');
    }

    case 'count':
      return [
        `function ${name}(source, predicate) {`,
        '  let count = 0;',
        '  for (const element of source) {',
        '    if (predicate === undefined || predicate(element)) count++;',
        '  }',
        '  return count;',
        '}'
      ].join('\n');

    case 'sum':
      return [
        `function ${name}(source, selector, zero = 0) {`,
        '  let total;',
        '  for (const element of source) {',
        '    const value = selector === undefined ? element : selector(element);',
        '    if (value != null) total = total === undefined ? value : total + value;',
        '  }',
        '  return total === undefined ? zero : total;',
        '}'
      ].join('\n');

    case 'average':
      return [
        `function ${name}(source, selector) {`,
        '  let total = 0;',
        '  let count = 0;',
        '  for (const element of source) {',
        '    const value = selector === undefined ? element : selector(element);',
        '    if (value == null) continue;',
        '    total += Number(value);',
        '    count++;',
        '  }',
        '  return count === 0 ? null : total / count;',
        '}'
      ].join('\n');

    case 'min':
    case 'max': {
      const better = helper === 'min' ? '<' : '>';
      return [
        `function ${name}(source, selector) {`,
        '  let result = null;',
        '  for (const element of source) {',
        '    const value = selector === undefined ? element : selector(element);',
        `    if (value != null && (result === null || value ${better} result)) result = value;`,
        '  }',
        '  return result;',
        '}'
      ].join('\n');
    }

    case 'first':
    case 'firstOrDefault': {
      const missing =
        helper === 'first'
          ? "  throw new Error('Sequence contains no matching element');"
          : '  return null;';
      return [
        `function ${name}(source, predicate) {`,
        '  for (const element of source) {',
        '    if (predicate === undefined || predicate(element)) return element;',
        '  }',
        missing,
        '}'
      ].join('\n');
    }

    case 'last':
    case 'lastOrDefault': {
      const missing =
        helper === 'last'
          ? "  if (!found) throw new Error('Sequence contains no matching element');"
          : '  if (!found) return null;';
      return [
        `function ${name}(source, predicate) {`,
        '  let found = false;',
        '  let result;',
        '  for (const element of source) {',
        '    if (predicate === undefined || predicate(element)) {',
        '      found = true;',
        '      result = element;',
        '    }',
        '  }',
        missing,
        '  return result;',
        '}'
      ].join('\n');
    }

    case 'any':
      return [
        `function ${name}(source, predicate) {`,
        '  for (const element of source) {',
        '    if (predicate === undefined || predicate(element)) return true;',
        '  }',
        '  return false;',
        '}'
      ].join('\n');

    case 'all':
      return [
        `function ${name}(source, predicate) {`,
        '  for (const element of source) {',
        '    if (!predicate(element)) return false;',
        '  }',
        '  return true;',
        '}'
      ].join('\n');
  }
}
