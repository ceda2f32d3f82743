// Declaration nodes: read-only projections of raw cursors that know how to render themselves

import {
  RawCursor, RawType, childrenOf, ANON_KINDS, INSTANCE_MEMBER_KINDS,
  STRUCTURED_DATA_KINDS
} from '../types';
import { CursorIndex, formatTemplateParameters, isCppClass } from './cursor-index';
import {
  SpellingContext, spellDeclarator, spellType, underlyingType, unsupportedTypeReason
} from './type-spelling';
import { collectAssociated, mergeAssociated } from './associations';
import { convertDialect, isReservedName, isUnsupportedOperator, stripTagPrefix } from '../dialect';

export type NodeVariant =
  | 'data'
  | 'function'
  | 'constructor'
  | 'enum'
  | 'union'
  | 'struct'
  | 'typedef'
  | 'macro'
  | 'opaque';

export const COMMENT_PREFIX = '#  ';
export const TAB = '    ';

export interface RenderContext extends SpellingContext {
  // replaces the declaration's own name (anonymous inlining)
  name?: string;
  // render with the `ctypedef` form
  typedef?: boolean;
  // renders an aggregate's member block, header included
  body(owner: AggregateNode, name: string, header: string, context: RenderContext): string[];
}

const VOID_TYPE: RawType = { kind: 'builtin', spelling: 'void' };

const OPENING = new Set(['(', '[', '{', '<']);
const CLOSING = new Set([')', ']', '}', '>']);

/**
 * True when the parameter's tokens hold an `=` outside any brackets. Child
 * expressions are no signal: array sizes and template arguments appear there too.
 */
function hasDefaultValue(param: RawCursor): boolean {
  let depth = 0;
  for (const token of param.tokens ?? []) {
    if (OPENING.has(token)) {
      depth++;
    } else if (CLOSING.has(token)) {
      depth--;
    } else if (token === '>>') {
      depth -= 2;
    } else if (token === '=' && depth <= 0) {
      return true;
    }
  }
  return false;
}

abstract class BaseNode {
  abstract readonly variant: NodeVariant;

  constructor(readonly cursor: RawCursor, readonly index: CursorIndex) {}

  get spelling(): string {
    return this.cursor.spelling;
  }

  get name(): string {
    return this.isAnonymous ? '' : this.cursor.spelling;
  }

  get qualifiedAddress(): string {
    return this.index.qualifiedAddress(this.cursor);
  }

  get namespace(): string {
    return this.index.namespaceOf(this.cursor);
  }

  get location(): string {
    return this.index.location(this.cursor);
  }

  get file(): string | undefined {
    return this.cursor.file;
  }

  get isPublic(): boolean {
    return this.cursor.access !== 'private' && this.cursor.access !== 'protected';
  }

  get isAnonymous(): boolean {
    return this.index.isAnonymous(this.cursor);
  }

  get isForwardDeclaration(): boolean {
    return this.index.isForwardDeclaration(this.cursor);
  }

  get key(): string {
    return this.index.identityOf(this.cursor);
  }

  get isStaticMethod(): boolean {
    return false;
  }

  associatedDeclarations(): RawCursor[] {
    const types = this.cursor.type ? [this.cursor.type] : [];
    return collectAssociated(types, childrenOf(this.cursor), this.index);
  }

  associatedTypes(): DeclarationNode[] {
    return this.associatedDeclarations().map(cursor => specialize(cursor, this.index));
  }

  unsupportedReason(): string | undefined {
    if (this.name && isReservedName(this.name)) {
      return `name '${this.name}' is reserved in Cython`;
    }
    return undefined;
  }

  abstract lines(context: RenderContext): string[];
}

export class DataNode extends BaseNode {
  readonly variant = 'data';

  get type(): RawType {
    return this.cursor.type ?? { kind: 'unexposed', spelling: 'int' };
  }

  unsupportedReason(): string | undefined {
    return super.unsupportedReason() ?? unsupportedTypeReason(this.type, this.index);
  }

  lines(context: RenderContext): string[] {
    const name = context.name ?? this.name;
    if (this.unsupportedReason() !== undefined) {
      return [`${COMMENT_PREFIX}${this.type.spelling} ${name}`];
    }
    return [this.declaration(name, context)];
  }

  /**
   * `<type> <name>` with the name placed inside the declarator.
   */
  declaration(name: string, context: SpellingContext): string {
    const { base, pointerOnly, depth } = underlyingType(this.type);
    const declaration = this.index.resolve(base.declaration);

    if (declaration && this.index.isAnonymous(declaration) && context.anonymousName?.(declaration) === undefined) {
      // Nobody named the aggregate, so it degrades to an opaque equivalent
      if (pointerOnly && depth > 0) {
        return `void${'*'.repeat(depth)} ${name}`;
      }
      return `char ${name}[${this.type.sizeBytes ?? base.sizeBytes ?? 1}]`;
    }

    return spellDeclarator(this.type, name, context);
  }

  // Parameter form: the type alone
  parameter(context: SpellingContext): string {
    return spellType(this.type, context);
  }
}

abstract class CallableNode extends BaseNode {
  get parameters(): DataNode[] {
    return childrenOf(this.cursor)
      .filter(child => child.kind === 'PARM_DECL')
      .map(child => new DataNode(child, this.index));
  }

  get templateParameters(): string {
    return formatTemplateParameters(this.cursor);
  }

  get isVariadic(): boolean {
    return this.cursor.isVariadic === true || this.cursor.type?.isVariadic === true;
  }

  get throws(): boolean {
    return this.cursor.exceptionSpec !== undefined && /throw|dynamic/.test(this.cursor.exceptionSpec);
  }

  /**
   * Index of the first parameter carrying a default value; the parameter
   * count when none does.
   */
  get firstOptionalIndex(): number {
    const params = this.parameters;
    const index = params.findIndex(param => hasDefaultValue(param.cursor));
    return index === -1 ? params.length : index;
  }

  get key(): string {
    const signature = this.parameters.map(param => param.type.spelling).join(', ');
    const qualifier = this.cursor.type && /\bconst$/.test(this.cursor.type.spelling) ? ' const' : '';
    return `${super.key}(${signature})${qualifier}`;
  }

  associatedDeclarations(): RawCursor[] {
    const own = collectAssociated(this.signatureTypes(), childrenOf(this.cursor), this.index);
    return mergeAssociated([own, ...this.parameters.map(param => param.associatedDeclarations())], this.index);
  }

  unsupportedReason(): string | undefined {
    if (isUnsupportedOperator(this.spelling)) {
      return `operator '${this.spelling}' has no Cython equivalent`;
    }
    const own = super.unsupportedReason();
    if (own !== undefined) {
      return own;
    }
    for (const type of this.signatureTypes()) {
      const reason = unsupportedTypeReason(type, this.index);
      if (reason !== undefined) {
        return reason;
      }
    }
    return undefined;
  }

  /**
   * One argument list per arity, from the first defaulted parameter up to
   * the full list.
   */
  protected argumentLists(context: SpellingContext, commented: boolean): string[] {
    const params = this.parameters;
    const lists: string[] = [];
    for (let count = this.firstOptionalIndex; count <= params.length; count++) {
      const args = params.slice(0, count).map(param =>
        commented ? convertDialect(stripTagPrefix(param.type.spelling)) : param.parameter(context)
      );
      if (this.isVariadic) {
        args.push('...');
      }
      lists.push(args.join(', '));
    }
    return lists;
  }

  protected signatureTypes(): RawType[] {
    return this.parameters.map(param => param.type);
  }
}

export class FunctionNode extends CallableNode {
  readonly variant = 'function';

  get resultType(): RawType {
    return this.cursor.resultType ?? this.cursor.type?.result ?? VOID_TYPE;
  }

  get isStaticMethod(): boolean {
    return this.cursor.kind !== 'FUNCTION_DECL' && this.cursor.isStaticMethod === true;
  }

  lines(context: RenderContext): string[] {
    const commented = this.unsupportedReason() !== undefined;
    const suffix = this.throws ? ' except +' : '';

    return this.argumentLists(context, commented).map(args => {
      const declarator = `${this.spelling}${this.templateParameters}(${args})`;
      if (commented) {
        return `${COMMENT_PREFIX}${convertDialect(stripTagPrefix(this.resultType.spelling))} ${declarator}${suffix}`;
      }
      return `${spellDeclarator(this.resultType, declarator, context)}${suffix}`;
    });
  }

  protected signatureTypes(): RawType[] {
    return [this.resultType, ...super.signatureTypes()];
  }
}

export class ConstructorNode extends CallableNode {
  readonly variant = 'constructor';

  get className(): string {
    const bracket = this.spelling.indexOf('<');
    return (bracket === -1 ? this.spelling : this.spelling.slice(0, bracket)).trim();
  }

  lines(context: RenderContext): string[] {
    const commented = this.unsupportedReason() !== undefined;
    const tmpl = this.templateParameters;
    const prefix = (commented ? COMMENT_PREFIX : '') + (tmpl ? 'void ' : '');
    const suffix = this.throws ? ' except +' : '';

    return this.argumentLists(context, commented).map(args => `${prefix}${this.className}${tmpl}(${args})${suffix}`);
  }
}

export class EnumNode extends BaseNode {
  readonly variant = 'enum';

  get isScoped(): boolean {
    return this.cursor.isScoped === true;
  }

  associatedDeclarations(): RawCursor[] {
    return [];
  }

  header(typedef: boolean, name: string): string {
    return `${typedef ? 'ctypedef ' : ''}enum ${this.isScoped ? 'class ' : ''}${name}:`;
  }

  lines(context: RenderContext): string[] {
    const name = context.name ?? this.name;
    if (this.isForwardDeclaration) {
      return [`enum ${name}`];
    }

    const constants = childrenOf(this.cursor).filter(child => child.kind === 'ENUM_CONSTANT_DECL');
    const body = constants.map(constant =>
      constant.enumValue === undefined ? `${TAB}${constant.spelling}` : `${TAB}${constant.spelling} = ${constant.enumValue}`
    );
    const header = this.header(context.typedef === true, name);
    const lines = [header, ...(body.length > 0 ? body : [`${TAB}pass`])];

    return this.unsupportedReason() === undefined ? lines : lines.map(line => COMMENT_PREFIX + line);
  }
}

export abstract class AggregateNode extends BaseNode {
  abstract get members(): DeclarationNode[];

  abstract header(typedef: boolean, name: string, context: SpellingContext): string;

  abstract forwardLine(name: string): string;

  associatedDeclarations(): RawCursor[] {
    return mergeAssociated(this.members.map(member => member.associatedDeclarations()), this.index, this.cursor);
  }

  lines(context: RenderContext): string[] {
    const name = context.name ?? this.name;
    if (this.isForwardDeclaration) {
      return [this.forwardLine(name)];
    }
    const header = this.header(context.typedef === true, name, context);
    if (this.unsupportedReason() !== undefined) {
      return [COMMENT_PREFIX + header];
    }
    return context.body(this, name, header, context);
  }

  protected isVisibleMember(child: RawCursor): boolean {
    if (child.access === 'private' || child.access === 'protected') {
      return false;
    }
    return ANON_KINDS.has(child.kind) || child.spelling.length > 0;
  }
}

export class UnionNode extends AggregateNode {
  readonly variant = 'union';

  get members(): DeclarationNode[] {
    return childrenOf(this.cursor)
      .filter(child => (child.kind === 'FIELD_DECL' || ANON_KINDS.has(child.kind)) && this.isVisibleMember(child))
      .map(child => specialize(child, this.index));
  }

  header(typedef: boolean, name: string): string {
    return `${typedef ? 'ctypedef ' : ''}union ${name}:`;
  }

  forwardLine(name: string): string {
    return `union ${name}`;
  }
}

export class StructNode extends AggregateNode {
  readonly variant = 'struct';

  get isCppClass(): boolean {
    return isCppClass(this.cursor);
  }

  get templateParameters(): string {
    return formatTemplateParameters(this.cursor);
  }

  get baseTypes(): RawType[] {
    return childrenOf(this.cursor)
      .filter(child => child.kind === 'CXX_BASE_SPECIFIER' && child.access !== 'private' && child.access !== 'protected')
      .flatMap(child => (child.type ? [child.type] : []));
  }

  get members(): DeclarationNode[] {
    const children = childrenOf(this.cursor);
    return children
      .filter(child => INSTANCE_MEMBER_KINDS.has(child.kind) && this.isVisibleMember(child))
      // a nested forward declaration is dropped when the same body defines the type
      .filter(child => !this.index.isForwardDeclaration(child) || !children.some(other =>
        other !== child && other.spelling === child.spelling && this.index.isDefinition(other)
      ))
      .map(child => specialize(child, this.index));
  }

  associatedDeclarations(): RawCursor[] {
    const bases = collectAssociated(this.baseTypes, [], this.index);
    return mergeAssociated([bases, super.associatedDeclarations()], this.index, this.cursor);
  }

  header(typedef: boolean, name: string, context: SpellingContext): string {
    if (!this.isCppClass) {
      return `${typedef ? 'ctypedef ' : ''}struct ${name}:`;
    }
    const bases = this.baseTypes.map(type => spellType(type, context));
    const inheritance = bases.length > 0 ? `(${bases.join(', ')})` : '';
    return `cppclass ${name}${this.templateParameters}${inheritance}:`;
  }

  forwardLine(name: string): string {
    return this.isCppClass ? `cppclass ${name}${this.templateParameters}` : `struct ${name}`;
  }
}

export class TypedefNode extends BaseNode {
  readonly variant = 'typedef';

  get underlying(): RawType {
    return this.cursor.underlyingType ?? this.cursor.type ?? { kind: 'unexposed', spelling: 'void' };
  }

  /**
   * The anonymous aggregate this typedef names directly, if any.
   */
  get anonymousTarget(): RawCursor | undefined {
    const { base, depth } = underlyingType(this.underlying);
    const declaration = this.index.resolve(base.declaration);
    if (depth === 0 && declaration && ANON_KINDS.has(declaration.kind) && this.index.isAnonymous(declaration)) {
      return declaration;
    }
    return undefined;
  }

  /**
   * `typedef struct Foo Foo;` restates a name Cython already has.
   */
  get isRedundant(): boolean {
    const declaration = this.index.resolve(this.underlying.declaration);
    return declaration !== undefined && declaration !== this.cursor &&
      !this.index.isAnonymous(declaration) && declaration.spelling === this.name &&
      this.index.location(declaration) === this.location;
  }

  associatedDeclarations(): RawCursor[] {
    return collectAssociated([this.underlying], childrenOf(this.cursor), this.index);
  }

  unsupportedReason(): string | undefined {
    return super.unsupportedReason() ?? unsupportedTypeReason(this.underlying, this.index);
  }

  lines(context: RenderContext): string[] {
    const name = context.name ?? this.name;
    if (name === '__builtin_va_list' || this.underlying.spelling.includes('__builtin_va_list')) {
      return [`ctypedef void* ${name}`];
    }
    if (this.unsupportedReason() !== undefined) {
      return [`${COMMENT_PREFIX}ctypedef ${this.underlying.spelling} ${name}`];
    }

    const anonymous = this.anonymousTarget;
    if (anonymous && context.anonymousName?.(anonymous) === undefined) {
      return specialize(anonymous, this.index).lines({ ...context, name, typedef: true });
    }

    return [`ctypedef ${spellDeclarator(this.underlying, name, context)}`];
  }
}

const INTEGER_LITERAL = /^[-+]?(?:0[xX][0-9a-fA-F]+|0[bB][01]+|\d+)[uUlL]*$/;
const FLOAT_LITERAL = /^[-+]?(?:(?:\d+\.\d*|\.\d+)(?:[eE][-+]?\d+)?|\d+[eE][-+]?\d+)[fFlL]?$/;
const STRING_LITERAL = /^(?:u8|[uUL])?"(?:[^"\\]|\\.)*"$/;

// `(a)+(b)` starts and ends with parentheses without being enclosed by one pair
function enclosedInParentheses(text: string): boolean {
  if (!text.startsWith('(') || !text.endsWith(')')) {
    return false;
  }
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '(') {
      depth++;
    } else if (text[i] === ')') {
      depth--;
      if (depth === 0 && i < text.length - 1) {
        return false;
      }
    }
  }
  return depth === 0;
}

export class MacroNode extends BaseNode {
  readonly variant = 'macro';

  get isFunctionLike(): boolean {
    return this.cursor.isMacroFunction === true;
  }

  /**
   * The replacement list with outer parentheses removed.
   */
  get body(): string {
    const tokens = this.cursor.tokens ?? [this.spelling];
    const start = this.isFunctionLike ? tokens.indexOf(')') + 1 : 1;
    let body = tokens.slice(start).join('');
    while (enclosedInParentheses(body)) {
      body = body.slice(1, -1);
    }
    return body;
  }

  get constantType(): string {
    const body = this.body;
    if (INTEGER_LITERAL.test(body)) {
      return 'const long';
    }
    if (FLOAT_LITERAL.test(body)) {
      return 'const double';
    }
    if (STRING_LITERAL.test(body)) {
      return 'const char*';
    }
    return 'const int';
  }

  associatedDeclarations(): RawCursor[] {
    return [];
  }

  lines(): string[] {
    const line = `${this.constantType} ${this.spelling}${this.isFunctionLike ? '(...)' : ''}`;
    return [this.unsupportedReason() === undefined ? line : COMMENT_PREFIX + line];
  }
}

export class OpaqueNode extends BaseNode {
  readonly variant = 'opaque';

  associatedDeclarations(): RawCursor[] {
    return [];
  }

  lines(): string[] {
    return [];
  }
}

export type DeclarationNode =
  | DataNode
  | FunctionNode
  | ConstructorNode
  | EnumNode
  | UnionNode
  | StructNode
  | TypedefNode
  | MacroNode
  | OpaqueNode;

/**
 * A FUNCTION_TEMPLATE returning void whose name, template arguments
 * stripped, is its class's name is a templated constructor.
 */
function isTemplatedConstructor(cursor: RawCursor, index: CursorIndex): boolean {
  const result = cursor.resultType ?? cursor.type?.result;
  if (result !== undefined && result.spelling !== 'void') {
    return false;
  }
  const parent = index.parentOf(cursor);
  if (!parent || !STRUCTURED_DATA_KINDS.has(parent.kind)) {
    return false;
  }
  const bracket = cursor.spelling.indexOf('<');
  const name = (bracket === -1 ? cursor.spelling : cursor.spelling.slice(0, bracket)).trim();
  return name === parent.spelling;
}

export function specialize(cursor: RawCursor, index: CursorIndex): DeclarationNode {
  switch (cursor.kind) {
    case 'FIELD_DECL':
    case 'VAR_DECL':
    case 'PARM_DECL':
      return new DataNode(cursor, index);
    case 'CONSTRUCTOR':
      return new ConstructorNode(cursor, index);
    case 'FUNCTION_TEMPLATE':
      return isTemplatedConstructor(cursor, index) ? new ConstructorNode(cursor, index) : new FunctionNode(cursor, index);
    case 'FUNCTION_DECL':
    case 'CXX_METHOD':
      return new FunctionNode(cursor, index);
    case 'ENUM_DECL':
      return new EnumNode(cursor, index);
    case 'UNION_DECL':
      return new UnionNode(cursor, index);
    case 'TYPEDEF_DECL':
    case 'TYPE_ALIAS_DECL':
      return new TypedefNode(cursor, index);
    case 'STRUCT_DECL':
    case 'CLASS_DECL':
    case 'CLASS_TEMPLATE':
      return new StructNode(cursor, index);
    case 'MACRO_DEFINITION':
      return new MacroNode(cursor, index);
    default:
      return new OpaqueNode(cursor, index);
  }
}

export function isAggregate(node: DeclarationNode): node is UnionNode | StructNode {
  return node.variant === 'union' || node.variant === 'struct';
}
