// Declarations a cursor refers to through its types

import { RawCursor, RawType, TEMPLATE_PARAMETER_KINDS, TYPE_REF_KINDS } from '../types';
import { CursorIndex } from './cursor-index';
import { walkType } from './type-spelling';

/**
 * Walks `types` and the TYPE_REF/TEMPLATE_REF cursors in `refs` with a
 * work-list, returning each referenced declaration once (its definition when
 * one is known). Template parameters are never returned.
 */
export function collectAssociated(types: readonly RawType[], refs: readonly RawCursor[], index: CursorIndex): RawCursor[] {
  const found = new Map<string, RawCursor>();

  const add = (declaration: RawCursor | undefined): void => {
    if (!declaration || TEMPLATE_PARAMETER_KINDS.has(declaration.kind)) {
      return;
    }
    const target = index.definitionOf(declaration) ?? declaration;
    const identity = index.identityOf(target);
    if (!found.has(identity)) {
      found.set(identity, target);
    }
  };

  for (const type of types) {
    walkType(type, nested => {
      if (nested.kind !== 'template_parameter') {
        add(index.resolve(nested.declaration));
      }
    });
  }

  for (const ref of refs) {
    if (TYPE_REF_KINDS.has(ref.kind)) {
      add(index.resolve(ref.referenced));
    }
  }

  return Array.from(found.values());
}

/**
 * Merges several association lists, keeping first occurrences.
 */
export function mergeAssociated(lists: readonly RawCursor[][], index: CursorIndex, exclude?: RawCursor): RawCursor[] {
  const merged = new Map<string, RawCursor>();
  const excluded = exclude ? index.identityOf(exclude) : undefined;
  for (const list of lists) {
    for (const cursor of list) {
      const identity = index.identityOf(cursor);
      if (identity !== excluded && !merged.has(identity)) {
        merged.set(identity, cursor);
      }
    }
  }
  return Array.from(merged.values());
}
