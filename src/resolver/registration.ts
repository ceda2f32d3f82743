// Registration pass: feeds declared and referenced types into the resolver

import { RawCursor, TEMPLATE_PARAMETER_KINDS } from '../types';
import { CursorIndex } from '../ast/cursor-index';
import { DeclarationNode, isAggregate } from '../ast/nodes';
import { Scope } from '../scope/scope';
import { TypeResolver, isStandardName } from './type-resolver';

export type ModuleNamer = (namespace: string) => string;

const TYPE_VARIANTS = new Set<DeclarationNode['variant']>(['struct', 'union', 'enum', 'typedef']);

/**
 * Declares a cursor the resolver has not seen yet. Standard-library names
 * stay with the standard tables.
 */
export function registerCursor(resolver: TypeResolver, index: CursorIndex, cursor: RawCursor, moduleFor: ModuleNamer): void {
  if (index.isAnonymous(cursor) || TEMPLATE_PARAMETER_KINDS.has(cursor.kind)) {
    return;
  }
  const address = index.qualifiedAddress(cursor);
  if (!address || isStandardName(address) || resolver.isKnown(address)) {
    return;
  }
  const namespace = index.namespaceOf(cursor);
  resolver.registerDeclared(address, { module: moduleFor(namespace), space: namespace, file: cursor.file });
}

/**
 * Declares every named type a scope emits, nested aggregates' types included.
 */
export function registerScope(resolver: TypeResolver, scope: Scope, moduleFor: ModuleNamer): void {
  const stack: DeclarationNode[] = [...scope.children];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      break;
    }
    if (TYPE_VARIANTS.has(node.variant) && !node.isAnonymous && node.qualifiedAddress) {
      resolver.registerDeclared(node.qualifiedAddress, {
        module: moduleFor(node.namespace),
        space: node.namespace,
        file: scope.fileOf(node)
      });
    }
    if (isAggregate(node)) {
      stack.push(...node.members);
    }
  }
}

/**
 * Runs every declaration a scope's children refer to through the resolver.
 */
export function registerReferences(resolver: TypeResolver, scope: Scope, index: CursorIndex, moduleFor: ModuleNamer): void {
  for (const child of scope.children) {
    for (const cursor of child.associatedDeclarations()) {
      if (index.isAnonymous(cursor) || TEMPLATE_PARAMETER_KINDS.has(cursor.kind)) {
        continue;
      }
      registerCursor(resolver, index, cursor, moduleFor);
      resolver.processReference(index.qualifiedAddress(cursor), scope.namespace);
    }
  }
}
