import type { ArrowFunctionExpression, Expression } from 'estree';

import type { CallSiteOptions, EmissionStrategy } from '../config';
import type { Diagnostic } from '../types/diagnostics';
import type { TypeRef } from '../types/schema';
import type { Structure } from '../types/structure';
import type { ShapeKind } from './shape-kinds';

/**
 * One projection call site handed to the compiler.
 */
export type CallSite = {
  /** Stable identifier used in the memo key when no location is given. */
  id?: string;

  location?: { file: string; line: number; column: number };

  /** Source type expression (`"Order"`) or an already resolved type. */
  sourceType: string | TypeRef;

  /** `o => ({ ... })` as source text or as a parsed ESTree node. */
  shape: string | Expression;

  /** Names the target of an object-literal shape. */
  targetName?: string;

  /** Enclosing namespace; reported in logs, never part of identity. */
  namespace?: string;

  /** Types of free variables the shape reads, as type expressions. */
  captures?: Readonly<Record<string, string>>;

  /** Overrides of the compiler options for this call site only. */
  options?: CallSiteOptions;
};

export type ForwardOutput = {
  /** The arrow function text. */
  expression: string;

  /** What to call: the prebuilt constant's name, or the arrow text. */
  reference: string;

  /** `const __project_... = ...;` for prebuilt emission. */
  declaration?: string;

  /** Per-field assignment expressions of the root Structure. */
  fields: Array<{ name: string; assignment: string }>;
};

export type ReverseOutput = {
  functionName: string;

  /** Inverse function declarations, dependencies first. */
  declarations: string[];
};

export type CompiledProjection = {
  success: true;
  structure: Structure;
  hash: string;
  typeName: string;
  shapeKind: ShapeKind['kind'];
  strategy: EmissionStrategy;
  forward: ForwardOutput;
  reverse: ReverseOutput;

  /** Runtime helper declarations the forward code calls. */
  helpers: string[];

  /** Interface declarations of every Structure in the tree. */
  typeDeclarations: string[];

  diagnostics: Diagnostic[];
};

export type FailedProjection = {
  success: false;
  diagnostics: Diagnostic[];
};

export type CompileResult = CompiledProjection | FailedProjection;

/**
 * What a call site compiles to before any session is involved: the
 * Structure tree and its forward code. This is what the memo cache holds;
 * type names, inverse names and prebuilt names are assigned per session.
 */
export type ShapeAnalysis =
  | FailedProjection
  | {
      success: true;
      structure: Structure;
      shapeKind: ShapeKind['kind'];

      /** Source name fragment for prebuilt emission, or why there is none. */
      prebuiltSource: { name: string } | { blocked: string };

      /** Free variables the shape reads. */
      captured: string[];

      forward: Omit<ForwardOutput, 'reference' | 'declaration'> & {
        node: ArrowFunctionExpression;
      };
      helpers: string[];
      diagnostics: Diagnostic[];
    };
