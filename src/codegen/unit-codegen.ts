// Output unit assembly: imports, auto-defined types and extern blocks of one module

import { Scope } from '../scope/scope';
import { TAB } from '../ast/nodes';
import { DeclarationRenderer } from './renderer';

export interface OutputUnit {
  // dotted module name, `A.B`
  module: string;
  text: string;
}

export interface UnitOptions {
  noImport: boolean;
  autoDefine: boolean;
}

export function renderAutoDefined(names: readonly string[]): string[] {
  if (names.length === 0) {
    return [];
  }
  return [
    '#  Auto-defined types',
    'cdef extern from *:',
    ...names.flatMap(name => [`${TAB}ctypedef struct ${name}:`, `${TAB}${TAB}pass`])
  ];
}

/**
 * Renders every scope of one module, then the imports and stand-in types
 * the rendering asked for. Sections are separated by a blank line.
 */
export function renderUnit(
  renderer: DeclarationRenderer,
  module: string,
  scopes: readonly Scope[],
  options: UnitOptions
): OutputUnit {
  const blocks = scopes.flatMap(scope => renderer.renderScope(scope));

  const imports = renderer.resolver.drainImports();
  const unresolved = renderer.drainUnresolvedTokens();

  const sections: string[][] = [];
  if (!options.noImport && imports.length > 0) {
    sections.push(['#  Imports', ...imports]);
  }
  if (options.autoDefine) {
    const autoDefined = renderAutoDefined(unresolved);
    if (autoDefined.length > 0) {
      sections.push(autoDefined);
    }
  }
  sections.push(...blocks);

  return { module, text: sections.map(section => section.join('\n')).join('\n\n') + '\n' };
}
