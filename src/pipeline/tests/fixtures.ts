import { isPlainObject } from '../../guards';
import type { TypeSchemaDefinition } from '../../schema';
import type { CompileResult } from '../result';
import { renderStandalone } from '../standalone';

/**
 * Shared test types and fixtures for the compiler suites.
 */

/**
 * TYPE DEFINITION: Test Scenario
 * Represents a single row of data in a table-driven test.
 *
 * @template T - The type of the expected result (defaults to unknown).
 */
export type TestScenario<T = unknown> = {
  /**
   * A short, unique identifier for the scenario (e.g., "Nullable Hop").
   * Used for quick identification in test logs.
   */
  id: string;

  /**
   * A human-readable explanation of the expected behavior.
   */
  description: string;

  /**
   * Source text of the expression or shape under test.
   */
  code: string;

  expected: T;
};

/**
 * Small order-management model used across suites.
 *
 * - `Order.customer`, `Customer.address`, `Address.city` are nullable hops.
 * - `Customer.favorites` is a nullable collection.
 * - `Product` is constructed with `new Product()`; `Shipment` cannot be
 *   constructed at all.
 */
export const commerceSchema = {
  entities: {
    Order: {
      members: {
        id: 'number',
        reference: 'string',
        total: 'number',
        placedAt: 'Date',
        notes: 'string | null',
        customer: 'Customer | null',
        lines: 'OrderLine[]',
        tags: 'Set<string>',
        version: { type: 'number', readonly: true }
      }
    },
    Customer: {
      members: {
        name: 'string',
        email: 'string | null',
        address: 'Address | null',
        favorites: 'Product[] | null'
      }
    },
    Address: {
      members: {
        street: 'string',
        city: 'City | null'
      }
    },
    City: {
      members: { name: 'string' }
    },
    OrderLine: {
      members: {
        sku: 'string',
        quantity: 'number',
        price: 'number',
        batch: 'bigint',
        product: 'Product | null'
      }
    },
    Product: {
      members: { name: 'string', category: 'string' },
      construction: 'constructor'
    },
    Shipment: {
      members: {
        orders: 'Order[]',
        labels: 'Iterable<string>'
      },
      construction: 'none'
    }
  }
} satisfies TypeSchemaDefinition;

export type Callable = (...args: unknown[]) => unknown;

/**
 * Wraps an evaluated function value so tests can call it with typed
 * arguments.
 */
export function toCallable(value: unknown): Callable {
  if (typeof value !== 'function') {
    throw new Error(`Expected a function, received ${typeof value}.`);
  }
  return (...args) => Reflect.apply(value, undefined, args);
}

/**
 * Evaluates a compiled call site (helpers, inverses, forward) and returns its
 * two functions.
 */
export function instantiate(result: CompileResult): {
  forward: Callable;
  reverse: Callable;
} {
  const factory: unknown = new Function(renderStandalone(result));
  const bundle = toCallable(factory)();

  if (!isPlainObject(bundle)) {
    throw new Error('Expected the standalone body to return an object.');
  }

  return {
    forward: toCallable(bundle['forward']),
    reverse: toCallable(bundle['reverse'])
  };
}

/**
 * Narrows a result to the success branch, failing the test otherwise.
 */
export function expectCompiled(
  result: CompileResult
): Extract<CompileResult, { success: true }> {
  if (!result.success) {
    throw new Error(
      `Expected the call site to compile: ${result.diagnostics
        .map(entry => entry.message)
        .join('; ')}`
    );
  }
  return result;
}
