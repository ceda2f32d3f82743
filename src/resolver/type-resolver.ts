// Symbol table for referenced types and the import accumulator

import stdImports from './std-imports.json';
import { convertDialect, flattenQualifiedName } from '../dialect';
import { WarningSink } from '../warnings';

export type TypeOrigin = 'local' | 'std' | 'builtin' | 'unknown';

export interface ResolvedType {
  qualifiedName: string;
  // module the type is cimported from
  module: string;
  basename: string;
  alias?: string;
  // namespace prefix of the qualified name
  space: string;
  // dotted path below the namespace, `Outer.Inner` for nested classes
  localPath: string;
  origin: TypeOrigin;
  file?: string;
}

export interface DeclaredDetails {
  module: string;
  space: string;
  file?: string;
}

export interface Importer {
  namespace: string;
  module: string;
  // files whose declarations are emitted in this run
  originFiles: ReadonlySet<string>;
}

export interface ImportResult {
  token: string;
  statement?: string;
  // declared in a file the run does not emit and not imported either
  external: boolean;
  resolved?: ResolvedType;
}

export interface TypeResolverOptions {
  importAll?: boolean;
  warnings?: WarningSink;
}

const BUILTINS = new Set<string>(stdImports.builtins);
const CORRECTIONS = new Map<string, string>(Object.entries(stdImports.corrections));
const STD_MODULES = new Map<string, string>(Object.entries(stdImports.modules));

export function isStandardName(qualifiedName: string): boolean {
  return BUILTINS.has(qualifiedName) || CORRECTIONS.has(qualifiedName) || STD_MODULES.has(qualifiedName);
}

function lastSegment(qualifiedName: string): string {
  const parts = qualifiedName.split('::');
  return parts[parts.length - 1];
}

/**
 * Run-wide table of every type the generator declares or references.
 *
 * Names enter `known` when declared (or when they resolve to the builtin and
 * standard-library tables) and stay there; anything referenced but never
 * declared sits in `unknown` and is reported once at the end of the run.
 */
export class TypeResolver {
  readonly known = new Map<string, ResolvedType>();
  readonly unknown = new Map<string, ResolvedType>();
  private readonly imports = new Set<string>();
  private readonly pendingUnresolved = new Set<string>();
  private readonly warned = new Set<string>();
  private readonly options: Required<Pick<TypeResolverOptions, 'importAll'>> & TypeResolverOptions;

  constructor(options: TypeResolverOptions = {}) {
    this.options = { importAll: false, ...options };
  }

  registerDeclared(qualifiedName: string, details: DeclaredDetails): ResolvedType {
    const local = details.space && qualifiedName.startsWith(`${details.space}::`)
      ? qualifiedName.slice(details.space.length + 2)
      : qualifiedName;
    const resolved: ResolvedType = {
      qualifiedName,
      module: details.module,
      basename: lastSegment(qualifiedName),
      space: details.space,
      localPath: local.split('::').join('.'),
      origin: 'local',
      file: details.file
    };
    this.unknown.delete(qualifiedName);
    this.pendingUnresolved.delete(qualifiedName);
    this.known.set(qualifiedName, resolved);
    return resolved;
  }

  isKnown(qualifiedName: string): boolean {
    return this.known.has(qualifiedName);
  }

  /**
   * Looks `typeString` up directly, then below each enclosing namespace of
   * `currentNamespace` from innermost to outermost, then in the builtin and
   * standard-library tables. Misses are recorded in `unknown`.
   */
  processReference(typeString: string, currentNamespace: string): ResolvedType | undefined {
    const found = this.lookup(typeString, currentNamespace);
    if (found) {
      return found;
    }

    if (BUILTINS.has(typeString)) {
      return this.remember(typeString, { module: '', origin: 'builtin' });
    }
    const corrected = CORRECTIONS.get(typeString);
    if (corrected !== undefined) {
      return this.remember(typeString, { module: '', origin: 'builtin', alias: corrected });
    }
    const module = STD_MODULES.get(typeString);
    if (module !== undefined) {
      return this.remember(typeString, { module, origin: 'std' });
    }

    if (!this.unknown.has(typeString)) {
      this.unknown.set(typeString, {
        qualifiedName: typeString,
        module: '',
        basename: lastSegment(typeString),
        space: '',
        localPath: typeString.split('::').join('.'),
        origin: 'unknown'
      });
    }
    this.pendingUnresolved.add(typeString);
    return undefined;
  }

  /**
   * The token a declaration in `importer` uses for `typeString`, plus the
   * import statement that makes it visible, if one is needed.
   */
  importFor(importer: Importer, typeString: string): ImportResult {
    const resolved = this.processReference(typeString, importer.namespace);

    if (!resolved) {
      return { token: this.fallbackToken(typeString, importer.namespace), external: false };
    }

    switch (resolved.origin) {
      case 'builtin':
        return { token: convertDialect(resolved.alias ?? resolved.qualifiedName), external: false, resolved };
      case 'std': {
        const statement = `from ${resolved.module} cimport ${resolved.basename}`;
        this.imports.add(statement);
        return { token: resolved.basename, statement, external: false, resolved };
      }
      case 'unknown':
        return { token: this.fallbackToken(typeString, importer.namespace), external: false, resolved };
      case 'local':
        return this.localImport(importer, resolved);
    }
  }

  drainImports(): string[] {
    const drained = Array.from(this.imports).sort();
    this.imports.clear();
    return drained;
  }

  drainUnresolved(): string[] {
    const drained = Array.from(this.pendingUnresolved).sort();
    this.pendingUnresolved.clear();
    return drained;
  }

  warnUnresolved(sink: WarningSink): void {
    for (const name of Array.from(this.unknown.keys()).sort()) {
      if (this.warned.has(name)) {
        continue;
      }
      this.warned.add(name);
      sink.warn(`Unresolved type '${name}'`, 2);
    }
  }

  private lookup(typeString: string, currentNamespace: string): ResolvedType | undefined {
    const direct = this.known.get(typeString);
    if (direct) {
      return direct;
    }
    const segments = currentNamespace ? currentNamespace.split('::') : [];
    for (let depth = segments.length; depth > 0; depth--) {
      const candidate = this.known.get(`${segments.slice(0, depth).join('::')}::${typeString}`);
      if (candidate) {
        return candidate;
      }
    }
    return undefined;
  }

  private remember(qualifiedName: string, record: { module: string; origin: TypeOrigin; alias?: string }): ResolvedType {
    const basename = lastSegment(qualifiedName);
    const resolved: ResolvedType = {
      qualifiedName,
      module: record.module,
      basename,
      alias: record.alias,
      space: '',
      localPath: basename,
      origin: record.origin
    };
    this.known.set(qualifiedName, resolved);
    this.unknown.delete(qualifiedName);
    return resolved;
  }

  private localImport(importer: Importer, resolved: ResolvedType): ImportResult {
    const space = resolved.space;
    const sameOrAncestor = space === '' || importer.namespace === space || importer.namespace.startsWith(`${space}::`);
    const emitted = resolved.file === undefined || importer.originFiles.has(resolved.file);

    if (sameOrAncestor) {
      if (!emitted && !this.options.importAll && importer.namespace === space && !this.warned.has(resolved.qualifiedName)) {
        this.warned.add(resolved.qualifiedName);
        this.options.warnings?.warn(
          `'${resolved.qualifiedName}' is declared in ${resolved.file ?? 'an unknown file'}, which is not part of this run`,
          2
        );
      }
      return { token: resolved.localPath, external: !emitted && !this.options.importAll, resolved };
    }

    const flatSpace = flattenQualifiedName(space);
    const token = `${flatSpace}_${resolved.localPath}`;

    if (!emitted && !this.options.importAll) {
      return { token, external: true, resolved };
    }

    // a module never cimports from itself; its extern blocks share one scope
    if (resolved.module === importer.module) {
      return { token: resolved.localPath, external: false, resolved };
    }

    const symbol = resolved.localPath.split('.')[0];
    const statement = `from ${resolved.module} cimport ${symbol} as ${flatSpace}_${symbol}`;
    this.imports.add(statement);
    return { token, statement, external: false, resolved };
  }

  /**
   * Dotted spelling relative to the current namespace.
   */
  private fallbackToken(typeString: string, currentNamespace: string): string {
    const relative = currentNamespace && typeString.startsWith(`${currentNamespace}::`)
      ? typeString.slice(currentNamespace.length + 2)
      : typeString;
    return relative.split('::').join('.');
  }
}
