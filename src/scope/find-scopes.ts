// Scope discovery and child filtering

import {
  RawCursor, childrenOf, ANON_KINDS, CLASS_SPACE_KINDS, NAMESPACE_MEMBER_KINDS
} from '../types';
import { CursorIndex, isCppClass } from '../ast/cursor-index';
import { DeclarationNode, specialize } from '../ast/nodes';
import { Scope } from './scope';

export interface ScopeRoots {
  address: string;
  roots: RawCursor[];
}

export interface AggregateOptions {
  // only children from originFiles are accepted when true
  restricted: boolean;
  originFiles: ReadonlySet<string>;
  // accept macro definitions
  defines: boolean;
  moduleFor(namespace: string): string;
}

/**
 * Groups every namespace and C++ class reachable from the translation units
 * by qualified address, in order of first appearance. Each translation unit
 * is a root of the global scope ''. Anonymous namespaces are skipped; inline
 * namespaces join their parent's scope.
 */
export function findScopes(units: readonly RawCursor[], index: CursorIndex): ScopeRoots[] {
  const scopes = new Map<string, RawCursor[]>();
  const add = (address: string, root: RawCursor): void => {
    const roots = scopes.get(address);
    if (roots) {
      roots.push(root);
    } else {
      scopes.set(address, [root]);
    }
  };

  const stack: RawCursor[] = [];
  for (let i = units.length - 1; i >= 0; i--) {
    stack.push(units[i]);
  }

  while (stack.length > 0) {
    const cursor = stack.pop();
    if (!cursor) {
      break;
    }

    if (cursor.kind === 'TRANSLATION_UNIT') {
      add('', cursor);
    } else if (cursor.kind === 'NAMESPACE') {
      if (cursor.isInlineNamespace) {
        add(index.location(cursor), cursor);
      } else if (index.isAnonymous(cursor)) {
        continue;
      } else {
        add(index.qualifiedAddress(cursor), cursor);
      }
    } else if (isCppClass(cursor) && index.isDefinition(cursor) && !index.isAnonymous(cursor)) {
      add(index.qualifiedAddress(cursor), cursor);
    } else {
      continue;
    }

    const nested = childrenOf(cursor).filter(child => child.kind === 'NAMESPACE' || isCppClass(child));
    for (let i = nested.length - 1; i >= 0; i--) {
      stack.push(nested[i]);
    }
  }

  return Array.from(scopes, ([address, roots]) => ({ address, roots }));
}

/**
 * Builds the scope for one address from all of its roots. A child is kept
 * when it is public, belongs to the scope's space (a class's static space
 * holds only static data members), is not a forward declaration of a type
 * defined elsewhere, comes from an origin file in restricted mode, and is a
 * named or aggregate declaration. Duplicates collapse onto the canonical
 * definition.
 */
export function aggregateScope(target: ScopeRoots, index: CursorIndex, options: AggregateOptions): Scope {
  const isClassSpace = target.roots.length > 0 && target.roots.every(root => root.kind !== 'TRANSLATION_UNIT' && root.kind !== 'NAMESPACE');
  const children: DeclarationNode[] = [];
  const positions = new Map<string, number>();

  for (const root of target.roots) {
    for (const child of childrenOf(root)) {
      if (!acceptsChild(child, isClassSpace, index, options)) {
        continue;
      }

      const node = specialize(child, index);
      if (!acceptsNode(node, options)) {
        continue;
      }

      const existing = positions.get(node.key);
      if (existing === undefined) {
        positions.set(node.key, children.length);
        children.push(node);
      } else if (index.canonicalDefinition(node.qualifiedAddress) === child) {
        children[existing] = node;
      }
    }
  }

  const namespace = isClassSpace ? index.namespaceOf(target.roots[0]) : target.address;
  return new Scope(
    target.address,
    target.roots,
    children,
    isClassSpace,
    namespace,
    options.moduleFor(namespace),
    options.originFiles,
    options.restricted
  );
}

function acceptsChild(child: RawCursor, isClassSpace: boolean, index: CursorIndex, options: AggregateOptions): boolean {
  if (child.access === 'private' || child.access === 'protected') {
    return false;
  }
  const space = isClassSpace ? CLASS_SPACE_KINDS : NAMESPACE_MEMBER_KINDS;
  if (!space.has(child.kind)) {
    return false;
  }
  if (index.isForwardDeclaration(child) && index.definitionOf(child) !== undefined) {
    return false;
  }
  if (options.restricted && (child.file === undefined || !options.originFiles.has(child.file))) {
    return false;
  }
  return true;
}

function acceptsNode(node: DeclarationNode, options: AggregateOptions): boolean {
  switch (node.variant) {
    case 'opaque':
      return false;
    case 'macro':
      return options.defines && node.name.length > 0;
    case 'typedef':
      return node.name.length > 0 && !node.isRedundant;
    case 'data':
    case 'function':
    case 'constructor':
      return node.name.length > 0;
    case 'enum':
    case 'union':
    case 'struct':
      return node.name.length > 0 || ANON_KINDS.has(node.cursor.kind);
  }
}
