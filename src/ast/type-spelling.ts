// Structural rendering of RawType descriptors into Cython declarator syntax

import { RawCursor, RawType } from '../types';
import { CursorIndex } from './cursor-index';
import { convertDialect, sanitizeTypeString, stripTagPrefix } from '../dialect';

export interface ReferenceTarget {
  // the declaration behind the reference, when the index knows it
  cursor?: RawCursor;
  qualifiedName: string;
  spelling: string;
}

export interface SpellingContext {
  index: CursorIndex;
  reference(target: ReferenceTarget): string;
  anonymousName?(cursor: RawCursor): string | undefined;
}

const NAMED_TYPE_KINDS = new Set(['record', 'enum', 'typedef', 'elaborated']);

export function spellType(type: RawType, context: SpellingContext): string {
  return spellDeclarator(type, '', context);
}

/**
 * Builds a C declarator around `declarator` (a variable name, `name(args)` for
 * a function, or nothing for an abstract type), so decorations such as
 * pointers, arrays and function-pointer parameter lists stay in place:
 *
 *   pointer(function(int) -> void), "cb"  =>  "void (*cb)(int)"
 *   array(int, 20), "data"                =>  "int data[20]"
 */
export function spellDeclarator(type: RawType, declarator: string, context: SpellingContext): string {
  return spellLayers(type, declarator, context, spellArguments(type, context));
}

/**
 * Spells every template and function-prototype argument nested in `type`,
 * innermost first, so an argument's own arguments are ready before it is
 * spelled and nothing recurses.
 */
function spellArguments(type: RawType, context: SpellingContext): Map<RawType, string> {
  const outerFirst: RawType[] = [];
  walkType(type, nested => {
    outerFirst.push(...(nested.argumentTypes ?? []), ...(nested.templateArguments ?? []));
  });

  const spelled = new Map<RawType, string>();
  for (let i = outerFirst.length - 1; i >= 0; i--) {
    const arg = outerFirst[i];
    if (!spelled.has(arg)) {
      spelled.set(arg, spellLayers(arg, '', context, spelled));
    }
  }
  return spelled;
}

function spelledArgument(arg: RawType, spelled: ReadonlyMap<RawType, string>): string {
  return spelled.get(arg) ?? convertDialect(stripTagPrefix(arg.spelling));
}

function spellLayers(type: RawType, declarator: string, context: SpellingContext, spelled: ReadonlyMap<RawType, string>): string {
  let current: RawType = type;
  let decl = declarator;

  for (;;) {
    switch (current.kind) {
      case 'pointer':
      case 'block_pointer':
      case 'lvalue_reference':
      case 'rvalue_reference': {
        const pointee = current.pointee;
        if (!pointee) {
          return joinDeclarator(convertDialect(stripTagPrefix(current.spelling)), decl);
        }
        const marker = declaratorMarker(current.kind);
        decl = needsParentheses(pointee) ? `(${marker}${decl})` : `${marker}${decl}`;
        current = pointee;
        break;
      }
      case 'constant_array':
      case 'incomplete_array': {
        const element = current.element;
        const size = current.kind === 'constant_array' && current.arraySize !== undefined ? String(current.arraySize) : '';
        if (!element) {
          return joinDeclarator(convertDialect(stripTagPrefix(current.spelling)), decl);
        }
        decl = `${decl}[${size}]`;
        current = element;
        break;
      }
      case 'function_proto': {
        const args = (current.argumentTypes ?? []).map(arg => spelledArgument(arg, spelled));
        if (current.isVariadic) {
          args.push('...');
        }
        decl = `${decl}(${args.join(', ')})`;
        if (!current.result) {
          return joinDeclarator('void', decl);
        }
        current = current.result;
        break;
      }
      default:
        return joinDeclarator(spellBase(current, context, spelled), decl);
    }
  }
}

function declaratorMarker(kind: RawType['kind']): string {
  switch (kind) {
    case 'block_pointer':
      return '^';
    case 'lvalue_reference':
      return '&';
    case 'rvalue_reference':
      return '&&';
    default:
      return '*';
  }
}

function needsParentheses(type: RawType): boolean {
  return type.kind === 'function_proto' || type.kind === 'constant_array' || type.kind === 'incomplete_array';
}

function joinDeclarator(base: string, declarator: string): string {
  if (!declarator) {
    return base;
  }
  const markers = /^[*&^]+/.exec(declarator);
  if (markers) {
    const rest = declarator.slice(markers[0].length).trim();
    return rest ? `${base}${markers[0]} ${rest}` : `${base}${markers[0]}`;
  }
  return `${base} ${declarator}`;
}

function spellBase(type: RawType, context: SpellingContext, spelled: ReadonlyMap<RawType, string>): string {
  if (!NAMED_TYPE_KINDS.has(type.kind) && !(type.kind === 'unexposed' && type.declaration)) {
    return convertDialect(stripTagPrefix(type.spelling));
  }

  const cursor = context.index.resolve(type.declaration);
  const isConst = type.isConst === true || /^const\s/.test(type.spelling);
  const constPrefix = isConst ? 'const ' : '';
  let name: string;

  if (cursor && context.index.isAnonymous(cursor)) {
    name = context.anonymousName?.(cursor) ?? 'void';
  } else {
    const qualifiedName = cursor ? context.index.qualifiedAddress(cursor) : sanitizeTypeString(stripTagPrefix(type.spelling));
    name = context.reference({ cursor, qualifiedName, spelling: type.spelling });
  }

  const args = type.templateArguments ?? [];
  const argList = args.length > 0 ? `[${args.map(arg => spelledArgument(arg, spelled)).join(', ')}]` : '';
  return `${constPrefix}${name}${argList}`;
}

/**
 * Visits a type and every type nested in it (pointee, element, function
 * result and arguments, template arguments) with an explicit stack.
 */
export function walkType(type: RawType, visit: (nested: RawType) => void): void {
  const stack: RawType[] = [type];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      break;
    }
    visit(current);
    if (current.pointee) stack.push(current.pointee);
    if (current.element) stack.push(current.element);
    if (current.result) stack.push(current.result);
    for (const arg of current.argumentTypes ?? []) stack.push(arg);
    for (const arg of current.templateArguments ?? []) stack.push(arg);
  }
}

/**
 * Strips pointer, reference and array layers. `pointerOnly` tells whether
 * every stripped layer was a pointer.
 */
export function underlyingType(type: RawType): { base: RawType; pointerOnly: boolean; depth: number } {
  let current = type;
  let pointerOnly = true;
  let depth = 0;
  for (;;) {
    if ((current.kind === 'pointer' || current.kind === 'lvalue_reference' || current.kind === 'rvalue_reference') && current.pointee) {
      pointerOnly = pointerOnly && current.kind === 'pointer';
      current = current.pointee;
    } else if ((current.kind === 'constant_array' || current.kind === 'incomplete_array') && current.element) {
      pointerOnly = false;
      current = current.element;
    } else {
      return { base: current, pointerOnly, depth };
    }
    depth++;
  }
}

/**
 * Why Cython cannot express a type, following typedefs into their
 * underlying types; `undefined` when it can.
 */
export function unsupportedTypeReason(type: RawType, index: CursorIndex): string | undefined {
  const pending: RawType[] = [type];
  const seenTypedefs = new Set<RawCursor>();
  let reason: string | undefined;

  while (pending.length > 0 && reason === undefined) {
    const next = pending.pop();
    if (!next) {
      break;
    }
    walkType(next, nested => {
      if (reason !== undefined) {
        return;
      }
      if (nested.kind === 'dependent') {
        reason = `dependent type '${nested.spelling}'`;
      } else if (nested.kind === 'block_pointer') {
        reason = `block pointer '${nested.spelling}'`;
      } else if (nested.kind === 'rvalue_reference') {
        reason = `rvalue reference '${nested.spelling}'`;
      } else if (nested.declaration) {
        const decl = index.resolve(nested.declaration);
        if (decl && decl.underlyingType && !seenTypedefs.has(decl)) {
          seenTypedefs.add(decl);
          pending.push(decl.underlyingType);
        }
      }
    });
  }

  return reason;
}
