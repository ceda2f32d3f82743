// Stub declarations for types an extern block uses but does not declare

import { RawCursor, STRUCTURED_DATA_KINDS } from '../types';
import { CursorIndex, formatTemplateParameters, isCppClass } from '../ast/cursor-index';
import { DeclarationNode, TAB } from '../ast/nodes';
import { underlyingType } from '../ast/type-spelling';
import { convertDialect } from '../dialect';

export interface ExternalReference {
  cursor: RawCursor;
  token: string;
}

function stubKeyword(cursor: RawCursor): string {
  if (STRUCTURED_DATA_KINDS.has(cursor.kind)) {
    return isCppClass(cursor) ? 'cppclass' : 'struct';
  }
  switch (cursor.kind) {
    case 'UNION_DECL':
      return 'union';
    case 'ENUM_DECL':
      return 'enum';
    default:
      return 'ctypedef struct';
  }
}

/**
 * `cppclass A_Widget "A::Widget":` + `pass`; the quoted name is left out
 * when it matches the token. Typedefs of builtin types keep their type.
 */
export function renderStub(cursor: RawCursor, token: string, cppName: string): string[] {
  const quoted = token === cppName ? '' : ` "${cppName}"`;

  if (cursor.kind === 'TYPEDEF_DECL' || cursor.kind === 'TYPE_ALIAS_DECL') {
    const underlying = cursor.underlyingType;
    if (underlying && underlyingType(underlying).depth === 0 && underlying.kind === 'builtin') {
      return [`ctypedef ${convertDialect(underlying.spelling)} ${token}${quoted}`];
    }
  }

  const keyword = stubKeyword(cursor);
  const tmpl = keyword === 'cppclass' ? formatTemplateParameters(cursor) : '';
  return [`${keyword} ${token}${tmpl}${quoted}:`, `${TAB}pass`];
}

/**
 * Restricted-mode prologue: one stub per external reference and per
 * forward declaration the scope never defines, sorted by qualified name,
 * indented for the extern block.
 */
export function renderPrologue(
  index: CursorIndex,
  blockNamespace: string,
  externals: readonly ExternalReference[],
  forwards: readonly DeclarationNode[]
): string[] {
  const stubs = new Map<string, string[]>();
  const relative = (address: string): string =>
    blockNamespace && address.startsWith(`${blockNamespace}::`) ? address.slice(blockNamespace.length + 2) : address;

  for (const { cursor, token } of externals) {
    const address = index.qualifiedAddress(cursor);
    if (!stubs.has(address)) {
      stubs.set(address, renderStub(cursor, token, relative(address)));
    }
  }
  for (const forward of forwards) {
    const address = forward.qualifiedAddress;
    if (!stubs.has(address)) {
      stubs.set(address, renderStub(forward.cursor, forward.name, relative(address)));
    }
  }

  return Array.from(stubs.keys())
    .sort()
    .flatMap(address => (stubs.get(address) ?? []).map(line => TAB + line));
}
