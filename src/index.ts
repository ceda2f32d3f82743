// Public API for pxdlower

export * from './types';
export { BindingGenerator, generateBindings } from './generator';
export type { GeneratorOptions, GeneratorResult } from './generator';
export { AstFormatError, formatGeneratorError } from './errors';
export type { GeneratorError } from './errors';
export { loadTranslationUnit, parseTranslationUnit, parseTranslationUnitText } from './ast/loader';
export { CursorIndex } from './ast/cursor-index';
export { specialize } from './ast/nodes';
export type { DeclarationNode, NodeVariant, RenderContext } from './ast/nodes';
export { convertDialect, sanitizeTypeString } from './dialect';
export { findScopes, aggregateScope } from './scope/find-scopes';
export { Scope } from './scope/scope';
export { TypeResolver } from './resolver/type-resolver';
export type { ResolvedType, ImportResult, Importer } from './resolver/type-resolver';
export { DeclarationRenderer } from './codegen/renderer';
export type { OutputUnit } from './codegen/unit-codegen';
export { IncludePathMapper } from './include-path-mapper';
export { writeOutputUnits, formatUnitsForStdout } from './writer';
export { Logger, LogLevel, logger } from './logger';
export { CollectingWarningSink } from './warnings';
export type { Severity, WarningSink } from './warnings';
