// Small builders for the JSON AST the front end hands over

import { RawCursor, RawTranslationUnit, RawType, RawDiagnostic, CursorKind, childrenOf } from '../../src/types';
import { CursorIndex } from '../../src/ast/cursor-index';
import { SpellingContext } from '../../src/ast/type-spelling';

export function builtin(spelling: string): RawType {
  return { kind: 'builtin', spelling };
}

export function pointer(pointee: RawType): RawType {
  return { kind: 'pointer', spelling: `${pointee.spelling} *`, pointee };
}

export function lref(pointee: RawType): RawType {
  return { kind: 'lvalue_reference', spelling: `${pointee.spelling} &`, pointee };
}

export function rref(pointee: RawType): RawType {
  return { kind: 'rvalue_reference', spelling: `${pointee.spelling} &&`, pointee };
}

export function array(element: RawType, size?: number): RawType {
  return size === undefined
    ? { kind: 'incomplete_array', spelling: `${element.spelling} []`, element }
    : { kind: 'constant_array', spelling: `${element.spelling} [${size}]`, element, arraySize: size };
}

export function named(kind: 'record' | 'enum' | 'typedef' | 'elaborated', spelling: string, declaration?: string, extra: Partial<RawType> = {}): RawType {
  return { kind, spelling, declaration, ...extra };
}

export function proto(result: RawType, args: RawType[], isVariadic = false): RawType {
  return {
    kind: 'function_proto',
    spelling: `${result.spelling} (${args.map(arg => arg.spelling).join(', ')})`,
    result,
    argumentTypes: args,
    isVariadic
  };
}

export function cursor(kind: CursorKind, spelling: string, extra: Partial<RawCursor> = {}): RawCursor {
  return { kind, spelling, ...extra };
}

export function field(name: string, type: RawType, extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('FIELD_DECL', name, { type, ...extra });
}

export function variable(name: string, type: RawType, extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('VAR_DECL', name, { type, ...extra });
}

export function param(name: string, type: RawType, defaultValue?: string): RawCursor {
  if (defaultValue === undefined) {
    return cursor('PARM_DECL', name, { type, tokens: [name], children: [] });
  }
  return cursor('PARM_DECL', name, {
    type,
    tokens: [name, '=', defaultValue],
    children: [cursor('INTEGER_LITERAL', '', { tokens: [defaultValue] })]
  });
}

export function fn(name: string, result: RawType, params: RawCursor[] = [], extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('FUNCTION_DECL', name, { resultType: result, children: params, ...extra });
}

export function method(name: string, result: RawType, params: RawCursor[] = [], extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('CXX_METHOD', name, { resultType: result, children: params, access: 'public', ...extra });
}

export function struct(name: string, id: string, children: RawCursor[], extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('STRUCT_DECL', name, { id, children, isDefinition: true, ...extra });
}

export function cppClass(name: string, id: string, children: RawCursor[], extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('CLASS_DECL', name, { id, children, isDefinition: true, ...extra });
}

export function namespace(name: string, children: RawCursor[], extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('NAMESPACE', name, { children, ...extra });
}

export function enumeration(name: string, id: string, constants: Array<[string, number | string]>, extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('ENUM_DECL', name, {
    id,
    isDefinition: true,
    children: constants.map(([constant, value]) => cursor('ENUM_CONSTANT_DECL', constant, { enumValue: value })),
    ...extra
  });
}

export function typedef(name: string, id: string, underlying: RawType, extra: Partial<RawCursor> = {}): RawCursor {
  return cursor('TYPEDEF_DECL', name, { id, underlyingType: underlying, ...extra });
}

/**
 * A translation unit; cursors without a file are attributed to `file`.
 */
export function unit(file: string, children: RawCursor[], diagnostics?: RawDiagnostic[]): RawTranslationUnit {
  const root = cursor('TRANSLATION_UNIT', file, { file, children });
  const stack: RawCursor[] = [...children];
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) {
      break;
    }
    if (next.file === undefined) {
      next.file = file;
    }
    stack.push(...childrenOf(next));
  }
  return diagnostics ? { file, cursor: root, diagnostics } : { file, cursor: root };
}

/**
 * References spell as the declaration's own name, without a resolver.
 */
export function plainSpellingContext(index: CursorIndex): SpellingContext {
  return {
    index,
    reference: target => target.cursor?.spelling || target.qualifiedName.split('::').pop() || target.spelling
  };
}
