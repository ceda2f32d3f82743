// Declaration renderer: turns scopes into extern blocks, resolving every type reference

import { RawCursor, TEMPLATE_PARAMETER_KINDS } from '../types';
import { CursorIndex } from '../ast/cursor-index';
import { DeclarationNode, RenderContext } from '../ast/nodes';
import { ReferenceTarget } from '../ast/type-spelling';
import { Scope } from '../scope/scope';
import { Importer, TypeResolver } from '../resolver/type-resolver';
import { ModuleNamer, registerCursor } from '../resolver/registration';
import { WarningSink } from '../warnings';
import { renderAggregateBody, renderBlock, SyntheticCounter } from './block-codegen';
import { ExternalReference, renderPrologue } from './prologue-codegen';

export interface DeclarationRendererOptions {
  // name used in `cdef extern from "<name>"` for a header file
  headerName(file: string): string;
  moduleFor: ModuleNamer;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function externHeader(headerName: string, namespace: string): string {
  const base = `cdef extern from "${headerName}"`;
  return namespace ? `${base} namespace "${namespace}":` : `${base}:`;
}

export class DeclarationRenderer {
  // unresolved name -> token used for it, since the last drain
  private readonly unresolvedTokens = new Map<string, string>();
  private readonly reported = new Set<string>();

  constructor(
    readonly index: CursorIndex,
    readonly resolver: TypeResolver,
    readonly warnings: WarningSink,
    private readonly options: DeclarationRendererOptions
  ) {}

  /**
   * One extern block per origin file of the scope, in order of first
   * appearance. Synthetic ordinals continue from block to block.
   */
  renderScope(scope: Scope): string[][] {
    const counter: SyntheticCounter = { next: 0 };
    return scope.files.map(file => this.renderExternBlock(scope, file, counter));
  }

  reportUnsupported(node: DeclarationNode, reason: string): void {
    const key = `${node.key}\u0000${reason}`;
    if (this.reported.has(key)) {
      return;
    }
    this.reported.add(key);
    this.warnings.warn(`Unsupported declaration '${node.qualifiedAddress || node.spelling}': ${reason}`, 2);
  }

  /**
   * Tokens of the names referenced without resolution since the last call,
   * restricted to plain identifiers, sorted.
   */
  drainUnresolvedTokens(): string[] {
    const tokens = new Set<string>();
    for (const name of this.resolver.drainUnresolved()) {
      const token = this.unresolvedTokens.get(name) ?? name.split('::').join('.');
      if (IDENTIFIER.test(token)) {
        tokens.add(token);
      }
    }
    this.unresolvedTokens.clear();
    return Array.from(tokens).sort();
  }

  createContext(importer: Importer, externals: Map<string, ExternalReference>): RenderContext {
    return {
      index: this.index,
      reference: target => this.referenceToken(importer, target, externals),
      body: (owner, name, header, context) => renderAggregateBody(this, owner, name, header, context)
    };
  }

  private renderExternBlock(scope: Scope, file: string, counter: SyntheticCounter): string[] {
    const externals = new Map<string, ExternalReference>();
    const importer: Importer = { namespace: scope.namespace, module: scope.module, originFiles: scope.originFiles };
    const members = scope.childrenFrom(file);

    const { body } = renderBlock(this, members, {
      name: scope.syntheticBase,
      mode: 'extern',
      context: this.createContext(importer, externals),
      counter,
      deferForwards: scope.restricted
    });

    const prologue = scope.restricted
      ? renderPrologue(this.index, scope.address, Array.from(externals.values()), members.filter(member => member.isForwardDeclaration))
      : [];

    return [externHeader(this.options.headerName(file), scope.address), ...prologue, ...body];
  }

  private referenceToken(importer: Importer, target: ReferenceTarget, externals: Map<string, ExternalReference>): string {
    const cursor = target.cursor;
    if (cursor && TEMPLATE_PARAMETER_KINDS.has(cursor.kind)) {
      return cursor.spelling;
    }
    if (cursor) {
      registerCursor(this.resolver, this.index, cursor, this.options.moduleFor);
    }

    const result = this.resolver.importFor(importer, target.qualifiedName);

    if (result.external && cursor) {
      const definition: RawCursor = this.index.definitionOf(cursor) ?? cursor;
      externals.set(this.index.identityOf(definition), { cursor: definition, token: result.token });
    }
    if (!result.resolved) {
      this.unresolvedTokens.set(target.qualifiedName, result.token);
    }
    return result.token;
  }
}
