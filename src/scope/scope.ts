// A qualified scope: the filtered declarations every root at one address contributes

import { RawCursor } from '../types';
import { DeclarationNode } from '../ast/nodes';
import { flattenQualifiedName } from '../dialect';

export class Scope {
  constructor(
    // `A::B` for namespaces, `A::Klass` for a class's static space, '' for the global scope
    readonly address: string,
    readonly roots: readonly RawCursor[],
    readonly children: readonly DeclarationNode[],
    readonly isClassSpace: boolean,
    // namespace chain the scope belongs to (a class space reports its enclosing namespace)
    readonly namespace: string,
    readonly module: string,
    readonly originFiles: ReadonlySet<string>,
    readonly restricted: boolean
  ) {}

  get hasDeclarations(): boolean {
    return this.children.length > 0;
  }

  /**
   * Name used when synthesizing names for anonymous aggregates.
   */
  get syntheticBase(): string {
    return this.address ? flattenQualifiedName(this.address) : 'toplevel';
  }

  /**
   * Files the children come from, in order of first appearance. Children
   * without a file are attributed to the first root's file.
   */
  get files(): string[] {
    const files: string[] = [];
    for (const child of this.children) {
      const file = this.fileOf(child);
      if (!files.includes(file)) {
        files.push(file);
      }
    }
    return files;
  }

  fileOf(child: DeclarationNode): string {
    return child.file ?? this.roots[0]?.file ?? '';
  }

  childrenFrom(file: string): DeclarationNode[] {
    return this.children.filter(child => this.fileOf(child) === file);
  }
}
