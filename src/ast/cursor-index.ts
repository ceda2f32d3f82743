// Lookup tables over one run's translation units

import {
  RawCursor, RawTranslationUnit, SPACE_KINDS, ANON_KINDS, STRUCTURED_DATA_KINDS,
  TYPEDEF_KINDS, childrenOf
} from '../types';

const ANONYMOUS_SPELLING = /^\((?:anonymous|unnamed)\b/;

const RECORD_KINDS = new Set(['STRUCT_DECL', 'CLASS_DECL', 'CLASS_TEMPLATE', 'UNION_DECL', 'ENUM_DECL']);

/**
 * Answers the structural questions a raw cursor cannot answer about itself:
 * who its lexical parent is, what an id refers to, and which of several
 * redeclarations of one qualified address is the canonical definition.
 *
 * Canonical definition rule: a definition always wins over a forward
 * declaration; among several definitions the lexicographically smallest
 * origin path wins, and the first one encountered breaks a remaining tie.
 */
export class CursorIndex {
  private readonly byId = new Map<string, RawCursor>();
  private readonly parents = new Map<RawCursor, RawCursor>();
  private readonly definitions = new Map<string, RawCursor>();
  private readonly addressCache = new Map<RawCursor, string>();
  private readonly serials = new Map<RawCursor, number>();

  constructor(units: RawTranslationUnit[] = []) {
    for (const unit of units) {
      this.addUnit(unit);
    }
  }

  addUnit(unit: RawTranslationUnit): void {
    const visited: RawCursor[] = [];
    const stack: RawCursor[] = [unit.cursor];

    while (stack.length > 0) {
      const cursor = stack.pop();
      if (!cursor) {
        break;
      }
      visited.push(cursor);
      this.serials.set(cursor, this.serials.size);

      const children = childrenOf(cursor);
      for (let i = children.length - 1; i >= 0; i--) {
        this.parents.set(children[i], cursor);
        stack.push(children[i]);
      }

      if (cursor.id) {
        const existing = this.byId.get(cursor.id);
        if (!existing || (!this.isDefinition(existing) && this.isDefinition(cursor))) {
          this.byId.set(cursor.id, cursor);
        }
      }
    }

    // Addresses need complete parent links, so definitions are indexed afterwards
    for (const cursor of visited) {
      if (!RECORD_KINDS.has(cursor.kind) && !TYPEDEF_KINDS.has(cursor.kind)) {
        continue;
      }
      if (!this.isDefinition(cursor) || this.isAnonymous(cursor)) {
        continue;
      }
      const address = this.qualifiedAddress(cursor);
      const current = this.definitions.get(address);
      if (!current || (cursor.file ?? '') < (current.file ?? '')) {
        this.definitions.set(address, cursor);
      }
    }
  }

  resolve(id: string | undefined): RawCursor | undefined {
    return id === undefined ? undefined : this.byId.get(id);
  }

  parentOf(cursor: RawCursor): RawCursor | undefined {
    return this.parents.get(cursor);
  }

  isDefinition(cursor: RawCursor): boolean {
    if (cursor.isDefinition !== undefined) {
      return cursor.isDefinition;
    }
    if (RECORD_KINDS.has(cursor.kind)) {
      return childrenOf(cursor).length > 0;
    }
    return true;
  }

  isAnonymous(cursor: RawCursor): boolean {
    if (cursor.isAnonymous !== undefined) {
      return cursor.isAnonymous;
    }
    if (!ANON_KINDS.has(cursor.kind) && cursor.kind !== 'NAMESPACE') {
      return false;
    }
    return cursor.spelling.length === 0 || ANONYMOUS_SPELLING.test(cursor.spelling);
  }

  isForwardDeclaration(cursor: RawCursor): boolean {
    return RECORD_KINDS.has(cursor.kind) && !this.isAnonymous(cursor) && !this.isDefinition(cursor);
  }

  /**
   * The definition behind a declaration: the cursor itself when it is one,
   * the cursor its `definition` id names, or the canonical definition of its
   * qualified address.
   */
  definitionOf(cursor: RawCursor): RawCursor | undefined {
    if (this.isDefinition(cursor)) {
      return cursor;
    }
    const linked = this.resolve(cursor.definition);
    if (linked && this.isDefinition(linked)) {
      return linked;
    }
    return this.definitions.get(this.qualifiedAddress(cursor));
  }

  canonicalDefinition(address: string): RawCursor | undefined {
    return this.definitions.get(address);
  }

  /**
   * `A::B::Name`: every named namespace/class/struct/union ancestor, inline
   * namespaces skipped, followed by the cursor's own spelling.
   */
  qualifiedAddress(cursor: RawCursor): string {
    const cached = this.addressCache.get(cursor);
    if (cached !== undefined) {
      return cached;
    }
    const location = this.location(cursor);
    const name = this.isAnonymous(cursor) ? '' : cursor.spelling;
    const address = [location, name].filter(part => part.length > 0).join('::');
    this.addressCache.set(cursor, address);
    return address;
  }

  /**
   * Stable identity: the qualified address, or for an anonymous declaration
   * its location plus the cursor id (traversal serial when the id is absent).
   */
  identityOf(cursor: RawCursor): string {
    if (!this.isAnonymous(cursor)) {
      return this.qualifiedAddress(cursor);
    }
    const tag = cursor.id ?? `#${this.serials.get(cursor) ?? -1}`;
    const location = this.location(cursor);
    return location ? `${location}::(anonymous ${tag})` : `(anonymous ${tag})`;
  }

  /**
   * The scope path of a cursor without its own name.
   */
  location(cursor: RawCursor): string {
    return this.ancestorNames(cursor, candidate => SPACE_KINDS.has(candidate.kind)).join('::');
  }

  /**
   * Namespace ancestors only: the part of an address that decides imports.
   */
  namespaceOf(cursor: RawCursor): string {
    return this.ancestorNames(cursor, candidate => candidate.kind === 'NAMESPACE').join('::');
  }

  private ancestorNames(cursor: RawCursor, include: (candidate: RawCursor) => boolean): string[] {
    const names: string[] = [];
    let current = this.parents.get(cursor);
    while (current) {
      if (include(current) && !current.isInlineNamespace && !this.isAnonymous(current) && current.spelling) {
        names.unshift(current.spelling);
      }
      current = this.parents.get(current);
    }
    return names;
  }
}

/**
 * Whether a struct/class cursor becomes a Cython `cppclass` rather than a
 * plain `struct`.
 */
export function isCppClass(cursor: RawCursor): boolean {
  if (cursor.kind === 'CLASS_DECL' || cursor.kind === 'CLASS_TEMPLATE') {
    return true;
  }
  if (!STRUCTURED_DATA_KINDS.has(cursor.kind)) {
    return false;
  }
  return childrenOf(cursor).some(child =>
    child.kind === 'CXX_METHOD' ||
    child.kind === 'CONSTRUCTOR' ||
    child.kind === 'DESTRUCTOR' ||
    child.kind === 'FUNCTION_TEMPLATE' ||
    child.kind === 'CXX_BASE_SPECIFIER'
  );
}

export function templateParameters(cursor: RawCursor): string[] {
  return childrenOf(cursor)
    .filter(child => child.kind === 'TEMPLATE_TYPE_PARAMETER' || child.kind === 'TEMPLATE_NON_TYPE_PARAMETER')
    .map(child => child.spelling);
}

export function formatTemplateParameters(cursor: RawCursor): string {
  const params = templateParameters(cursor);
  return params.length > 0 ? `[${params.join(', ')}]` : '';
}
