export {
  createProjectionCompiler,
  CompilerSession,
  type CompilerDependencies,
  type ProjectionCompiler
} from './pipeline/compiler';
export {
  createProjectionCache,
  memoKey,
  type MemoKeyParts,
  type ProjectionCache
} from './pipeline/cache';
export type {
  CallSite,
  CompiledProjection,
  CompileResult,
  FailedProjection,
  ForwardOutput,
  ReverseOutput,
  ShapeAnalysis
} from './pipeline/result';
export { classifyShape, type ShapeKind } from './pipeline/shape-kinds';
export {
  formatDiagnostic,
  formatDiagnostics,
  type DiagnosticReportOptions
} from './pipeline/report';
export { renderStandalone } from './pipeline/standalone';

export {
  callSiteOptionsSchema,
  compilerOptionsSchema,
  resolveCompilerOptions,
  type CallSiteOptions,
  type EmissionStrategy,
  type ProjectionCompilerOptions,
  type ResolvedCompilerOptions
} from './config';
export {
  createTypeSchema,
  typeKey,
  type GroupingMembers,
  type TypeSchemaDefinition
} from './schema';
export { typeSchemaDefinition } from './schema/definition';
export { createLogger, type Logger } from './logger';
export {
  IdentityCollisionError,
  OptionsValidationError,
  ProjectionError,
  SchemaDefinitionError,
  ShapeSyntaxError
} from './errors';

export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity
} from './types/diagnostics';
export type {
  CollectionKind,
  EntityInfo,
  MemberInfo,
  TypeRef,
  TypeSchemaOracle
} from './types/schema';
export type {
  Field,
  NestedCollection,
  NestedField,
  NestedObject,
  Structure
} from './types/structure';
export type { NullabilityReason } from './nullability/resolver';
