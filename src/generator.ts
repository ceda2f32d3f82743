// Binding generator: runs the lowering pipeline over a set of translation units

import { RawCursor, RawTranslationUnit, childrenOf } from './types';
import { CursorIndex } from './ast/cursor-index';
import { loadTranslationUnit } from './ast/loader';
import { aggregateScope, findScopes } from './scope/find-scopes';
import { Scope } from './scope/scope';
import { TypeResolver } from './resolver/type-resolver';
import { ModuleNamer, registerReferences, registerScope } from './resolver/registration';
import { DeclarationRenderer } from './codegen/renderer';
import { OutputUnit, renderUnit } from './codegen/unit-codegen';
import { IncludePathMapper, globToRegExp } from './include-path-mapper';
import { CollectingWarningSink, WarningSink, toSeverity } from './warnings';
import { Logger, logger as defaultLogger } from './logger';
import { AstFormatError, GeneratorError } from './errors';

export interface GeneratorOptions {
  // module of the global namespace; defaults to the first header's basename
  rootModule?: string;
  includeRoots?: string[];
  systemHeaders?: boolean;
  // headers matching this pattern join the origin set
  headerPattern?: string;
  warningLevel?: number;
  // abort on upstream diagnostics of severity 3 and above
  strict?: boolean;
  importAll?: boolean;
  // emit declarations from every header the units include
  recursive?: boolean;
  noImport?: boolean;
  autoDefine?: boolean;
  defines?: boolean;
  // receives every warning in addition to the result
  warnings?: WarningSink;
  logger?: Logger;
}

export interface GeneratorResult {
  units: OutputUnit[];
  errors: GeneratorError[];
  warnings: string[];
}

type ResolvedOptions = Required<Omit<GeneratorOptions, 'rootModule' | 'headerPattern' | 'warnings'>> &
  Pick<GeneratorOptions, 'rootModule' | 'headerPattern' | 'warnings'>;

export class BindingGenerator {
  private readonly options: ResolvedOptions;

  constructor(options: GeneratorOptions = {}) {
    this.options = {
      includeRoots: [],
      systemHeaders: false,
      warningLevel: 2,
      strict: false,
      importAll: false,
      recursive: false,
      noImport: false,
      autoDefine: false,
      defines: false,
      logger: defaultLogger,
      ...options
    };
  }

  generate(units: RawTranslationUnit[]): GeneratorResult {
    const { options } = this;
    const log = options.logger;
    const collected = new CollectingWarningSink(options.warnings ? Number.POSITIVE_INFINITY : options.warningLevel, log);
    const external = options.warnings;
    const sink: WarningSink = external
      ? { warn: (message, severity) => { collected.warn(message, severity); external.warn(message, severity); } }
      : collected;
    const result: GeneratorResult = { units: [], errors: [], warnings: [] };
    const finish = (): GeneratorResult => {
      result.warnings = collected.messages(options.warningLevel);
      return result;
    };

    if (units.length === 0) {
      return finish();
    }

    for (const unit of units) {
      for (const diagnostic of unit.diagnostics ?? []) {
        if (diagnostic.severity >= 3 && options.strict) {
          result.errors.push({
            filename: diagnostic.file ?? unit.file,
            line: diagnostic.line,
            column: diagnostic.column,
            message: diagnostic.message,
            severity: 'error'
          });
        } else if (diagnostic.severity > 0) {
          const where = diagnostic.file ?? unit.file;
          const loc = diagnostic.line !== undefined ? `:${diagnostic.line}` : '';
          sink.warn(`${where}${loc}: ${diagnostic.message}`, toSeverity(diagnostic.severity));
        }
      }
    }
    if (result.errors.length > 0) {
      log.debug(`Aborting: ${result.errors.length} upstream diagnostic(s) in strict mode`);
      return finish();
    }

    const mapper = new IncludePathMapper({ includeRoots: options.includeRoots, systemHeaders: options.systemHeaders });
    const rootModule = options.rootModule ?? mapper.defaultRootModule(units[0].file);
    const moduleFor: ModuleNamer = namespace => mapper.moduleName(namespace, rootModule);

    const index = new CursorIndex(units);
    const originFiles = this.originFiles(units);
    const scopes: Scope[] = findScopes(units.map(unit => unit.cursor), index)
      .map(roots => aggregateScope(roots, index, {
        restricted: !options.recursive,
        originFiles,
        defines: options.defines,
        moduleFor
      }))
      .filter(scope => scope.hasDeclarations);
    log.debug(`Aggregated ${scopes.length} scope(s) from ${units.length} translation unit(s)`);

    const resolver = new TypeResolver({ importAll: options.importAll, warnings: sink });
    for (const scope of scopes) {
      registerScope(resolver, scope, moduleFor);
    }
    for (const scope of scopes) {
      registerReferences(resolver, scope, index, moduleFor);
    }
    resolver.drainUnresolved();

    const renderer = new DeclarationRenderer(index, resolver, sink, {
      headerName: file => mapper.headerName(file),
      moduleFor
    });

    const byModule = new Map<string, Scope[]>();
    for (const scope of scopes) {
      const group = byModule.get(scope.module);
      if (group) {
        group.push(scope);
      } else {
        byModule.set(scope.module, [scope]);
      }
    }
    for (const [module, group] of byModule) {
      result.units.push(renderUnit(renderer, module, group, {
        noImport: options.noImport,
        autoDefine: options.autoDefine
      }));
      log.debug(`Rendered module ${module} (${group.length} scope(s))`);
    }

    resolver.warnUnresolved(sink);
    return finish();
  }

  /**
   * Loads each AST file, then generates. Malformed files become errors.
   */
  async generateFromFiles(files: string[]): Promise<GeneratorResult> {
    const units: RawTranslationUnit[] = [];
    const errors: GeneratorError[] = [];

    for (const file of files) {
      try {
        units.push(await loadTranslationUnit(file));
      } catch (error) {
        if (error instanceof AstFormatError) {
          errors.push({ filename: error.filename ?? file, message: error.message, severity: 'error' });
        } else {
          errors.push({ filename: file, message: error instanceof Error ? error.message : String(error), severity: 'error' });
        }
      }
    }

    if (errors.length > 0) {
      return { units: [], errors, warnings: [] };
    }
    return this.generate(units);
  }

  /**
   * Files whose declarations this run emits: the units' own headers, every
   * included header in recursive mode, and headers matching the pattern.
   */
  private originFiles(units: readonly RawTranslationUnit[]): Set<string> {
    const files = new Set(units.map(unit => unit.file));
    const { recursive, headerPattern } = this.options;
    if (!recursive && !headerPattern) {
      return files;
    }

    const pattern = headerPattern ? globToRegExp(headerPattern) : undefined;
    const stack: RawCursor[] = units.map(unit => unit.cursor);
    while (stack.length > 0) {
      const cursor = stack.pop();
      if (!cursor) {
        break;
      }
      if (cursor.file && !files.has(cursor.file)) {
        const normalized = cursor.file.replace(/\\/g, '/');
        const base = normalized.slice(normalized.lastIndexOf('/') + 1);
        if (recursive || (pattern && (pattern.test(normalized) || pattern.test(base)))) {
          files.add(cursor.file);
        }
      }
      stack.push(...childrenOf(cursor));
    }
    return files;
  }
}

export function generateBindings(units: RawTranslationUnit[], options: GeneratorOptions = {}): GeneratorResult {
  return new BindingGenerator(options).generate(units);
}
