// Core type definitions for pxdlower: the JSON AST handed over by the C/C++ front end

export const CURSOR_KINDS = [
  'TRANSLATION_UNIT',
  'NAMESPACE',
  'STRUCT_DECL',
  'CLASS_DECL',
  'CLASS_TEMPLATE',
  'UNION_DECL',
  'ENUM_DECL',
  'ENUM_CONSTANT_DECL',
  'FIELD_DECL',
  'VAR_DECL',
  'PARM_DECL',
  'FUNCTION_DECL',
  'CXX_METHOD',
  'FUNCTION_TEMPLATE',
  'CONSTRUCTOR',
  'DESTRUCTOR',
  'TYPEDEF_DECL',
  'TYPE_ALIAS_DECL',
  'MACRO_DEFINITION',
  'TEMPLATE_TYPE_PARAMETER',
  'TEMPLATE_NON_TYPE_PARAMETER',
  'TYPE_REF',
  'TEMPLATE_REF',
  'NAMESPACE_REF',
  'CXX_BASE_SPECIFIER',
  'CXX_ACCESS_SPEC_DECL',
  'UNEXPOSED_EXPR',
  'INTEGER_LITERAL',
  'FLOATING_LITERAL',
  'STRING_LITERAL',
  'CHARACTER_LITERAL',
  'CXX_BOOL_LITERAL_EXPR',
  'CXX_NULL_PTR_LITERAL_EXPR',
  'DECL_REF_EXPR',
  'CALL_EXPR',
  'UNARY_OPERATOR',
  'BINARY_OPERATOR',
  'UNEXPOSED_DECL'
] as const;

export type CursorKind = typeof CURSOR_KINDS[number];

export const TYPE_KINDS = [
  'builtin',
  'pointer',
  'lvalue_reference',
  'rvalue_reference',
  'constant_array',
  'incomplete_array',
  'record',
  'enum',
  'typedef',
  'elaborated',
  'function_proto',
  'block_pointer',
  'dependent',
  'template_parameter',
  'unexposed'
] as const;

export type TypeKind = typeof TYPE_KINDS[number];

export type AccessSpecifier = 'public' | 'protected' | 'private' | 'none';

export type StorageClass = 'none' | 'static' | 'extern';

export interface RawType {
  kind: TypeKind;
  spelling: string;
  isConst?: boolean;
  // pointer and reference types
  pointee?: RawType;
  // array types
  element?: RawType;
  arraySize?: number;
  // cursor id of the declaration behind a record/enum/typedef/elaborated type
  declaration?: string;
  templateArguments?: RawType[];
  // function prototypes
  result?: RawType;
  argumentTypes?: RawType[];
  isVariadic?: boolean;
  sizeBytes?: number;
}

export interface RawCursor {
  id?: string;
  kind: CursorKind;
  spelling: string;
  displayName?: string;
  file?: string;
  access?: AccessSpecifier;
  isDefinition?: boolean;
  // cursor id of the definition when this cursor is only a declaration
  definition?: string;
  isAnonymous?: boolean;
  isInlineNamespace?: boolean;
  isScoped?: boolean;
  storage?: StorageClass;
  isStaticMethod?: boolean;
  isVariadic?: boolean;
  isMacroFunction?: boolean;
  exceptionSpec?: string;
  tokens?: string[];
  // decimal text when the value exceeds the safe integer range
  enumValue?: number | string;
  type?: RawType;
  resultType?: RawType;
  underlyingType?: RawType;
  // cursor id a TYPE_REF / TEMPLATE_REF points at
  referenced?: string;
  children?: RawCursor[];
}

export interface RawDiagnostic {
  severity: number;
  message: string;
  file?: string;
  line?: number;
  column?: number;
}

export interface RawTranslationUnit {
  file: string;
  cursor: RawCursor;
  diagnostics?: RawDiagnostic[];
}

export const SPACE_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'STRUCT_DECL', 'CLASS_DECL', 'CLASS_TEMPLATE', 'UNION_DECL', 'NAMESPACE'
]);

export const STRUCTURED_DATA_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'STRUCT_DECL', 'CLASS_DECL', 'CLASS_TEMPLATE'
]);

export const ANON_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'STRUCT_DECL', 'CLASS_DECL', 'UNION_DECL', 'ENUM_DECL'
]);

export const TYPEDEF_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'TYPEDEF_DECL', 'TYPE_ALIAS_DECL'
]);

export const TEMPLATE_PARAMETER_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'TEMPLATE_TYPE_PARAMETER', 'TEMPLATE_NON_TYPE_PARAMETER'
]);

export const TYPE_REF_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'TYPE_REF', 'TEMPLATE_REF'
]);

// Members that live in the instance side of a C++ class
export const INSTANCE_MEMBER_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'FIELD_DECL',
  'CONSTRUCTOR',
  'CXX_METHOD',
  'FUNCTION_TEMPLATE',
  'TYPEDEF_DECL',
  'TYPE_ALIAS_DECL',
  'ENUM_DECL',
  'CLASS_DECL',
  'STRUCT_DECL',
  'CLASS_TEMPLATE',
  'UNION_DECL'
]);

// Static data members are the only thing a class contributes to its static space
export const CLASS_SPACE_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>(['VAR_DECL']);

export const NAMESPACE_MEMBER_KINDS: ReadonlySet<CursorKind> = new Set<CursorKind>([
  'VAR_DECL',
  'FUNCTION_DECL',
  'FUNCTION_TEMPLATE',
  'TYPEDEF_DECL',
  'TYPE_ALIAS_DECL',
  'ENUM_DECL',
  'CLASS_DECL',
  'STRUCT_DECL',
  'CLASS_TEMPLATE',
  'UNION_DECL',
  'MACRO_DEFINITION'
]);


export function isCursorKind(value: string): value is CursorKind {
  return CURSOR_KINDS.some(kind => kind === value);
}

export function isTypeKind(value: string): value is TypeKind {
  return TYPE_KINDS.some(kind => kind === value);
}

export function childrenOf(cursor: RawCursor): RawCursor[] {
  return cursor.children ?? [];
}
