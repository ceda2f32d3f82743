import { describe, it, expect } from 'vitest';
import { CursorIndex } from '../src/ast/cursor-index';
import { RenderContext, specialize } from '../src/ast/nodes';
import { RawCursor } from '../src/types';
import {
  array, builtin, cursor, enumeration, field, fn, lref, method, named, param, plainSpellingContext, pointer, proto, rref, struct, typedef,
  unit, variable
} from './helpers/ast-builders';

function contextFor(index: CursorIndex): RenderContext {
  return { ...plainSpellingContext(index), body: (_owner, _name, header) => [header] };
}

function render(target: RawCursor, siblings: RawCursor[] = []): string[] {
  const index = new CursorIndex([unit('test.h', [...siblings, target])]);
  return specialize(target, index).lines(contextFor(index));
}

describe('specialize', () => {
  it('dispatches on the cursor kind', () => {
    const ctor = cursor('FUNCTION_TEMPLATE', 'Box<U>', {
      resultType: builtin('void'),
      children: [cursor('TEMPLATE_TYPE_PARAMETER', 'U'), param('value', { kind: 'template_parameter', spelling: 'U' })]
    });
    const factory = cursor('FUNCTION_TEMPLATE', 'make', { resultType: builtin('int') });
    const box = cursor('CLASS_TEMPLATE', 'Box', { id: 'box', isDefinition: true, children: [cursor('TEMPLATE_TYPE_PARAMETER', 'T'), ctor, factory] });
    const other = cursor('UNEXPOSED_DECL', 'static_assert');
    const index = new CursorIndex([unit('box.h', [box, other])]);

    expect(specialize(box, index).variant).toBe('struct');
    expect(specialize(ctor, index).variant).toBe('constructor');
    expect(specialize(factory, index).variant).toBe('function');
    expect(specialize(other, index).variant).toBe('opaque');
    expect(specialize(field('x', builtin('int')), index).variant).toBe('data');
    expect(specialize(cursor('MACRO_DEFINITION', 'N'), index).variant).toBe('macro');
  });

  it('renders a templated constructor with a void prefix', () => {
    const ctor = cursor('FUNCTION_TEMPLATE', 'Box<U>', {
      resultType: builtin('void'),
      children: [cursor('TEMPLATE_TYPE_PARAMETER', 'U'), param('value', { kind: 'template_parameter', spelling: 'U' })]
    });
    const box = cursor('CLASS_TEMPLATE', 'Box', { id: 'box', isDefinition: true, children: [ctor] });
    const index = new CursorIndex([unit('box.h', [box])]);
    expect(specialize(ctor, index).lines(contextFor(index))).toEqual(['void Box[U](U)']);
  });

  it('keys overloads by signature', () => {
    const first = fn('scale', builtin('int'), [param('x', builtin('int'))]);
    const second = fn('scale', builtin('int'), [param('x', builtin('double'))]);
    const index = new CursorIndex([unit('scale.h', [first, second])]);
    expect(specialize(first, index).key).toBe('scale(int)');
    expect(specialize(second, index).key).toBe('scale(double)');
  });
});

describe('function rendering', () => {
  it('expands default arguments into one overload per arity', () => {
    const scale = fn('scale', builtin('double'), [
      param('value', builtin('int')),
      param('factor', builtin('double'), '1.0'),
      param('offset', builtin('int'), '2')
    ]);
    expect(render(scale)).toEqual([
      'double scale(int)',
      'double scale(int, double)',
      'double scale(int, double, int)'
    ]);
  });

  it('does not read an array size as a default argument', () => {
    const buffer = cursor('PARM_DECL', 'buf', {
      type: array(builtin('int'), 4),
      tokens: ['int', 'buf', '[', '4', ']'],
      children: [cursor('INTEGER_LITERAL', '', { tokens: ['4'] })]
    });
    const fill = fn('fill', builtin('void'), [buffer, param('n', builtin('int'))]);
    expect(render(fill)).toEqual(['void fill(int [4], int)']);
  });

  it('ignores an = nested inside template brackets', () => {
    const option = cursor('PARM_DECL', 'o', {
      type: builtin('int'),
      tokens: ['Opt', '<', 'N', '=', '1', '>', 'o']
    });
    const configure = fn('configure', builtin('void'), [option]);
    expect(render(configure)).toEqual(['void configure(int)']);
  });

  it('appends the ellipsis for variadic functions', () => {
    const log = fn('log_message', builtin('int'), [param('fmt', pointer(builtin('const char')))], { isVariadic: true });
    expect(render(log)).toEqual(['int log_message(const char*, ...)']);
  });

  it('marks dynamic exception specifications', () => {
    const open = fn('open_stream', builtin('void'), [], { exceptionSpec: 'dynamic' });
    expect(render(open)).toEqual(['void open_stream() except +']);
  });

  it('uses declarator syntax for functions returning function pointers', () => {
    const handler = fn('get_handler', pointer(proto(builtin('void'), [builtin('int')])));
    expect(render(handler)).toEqual(['void (*get_handler())(int)']);
  });

  it('lists function template parameters', () => {
    const t = { kind: 'template_parameter' as const, spelling: 'T' };
    const maxOf = cursor('FUNCTION_TEMPLATE', 'max_of', {
      resultType: t,
      children: [cursor('TEMPLATE_TYPE_PARAMETER', 'T'), param('a', t), param('b', t)]
    });
    expect(render(maxOf)).toEqual(['T max_of[T](T, T)']);
  });

  it('comments out unsupported operators', () => {
    const vec = named('record', 'Vec', 'vec');
    const vecStruct = struct('Vec', 'vec', [field('x', builtin('double'))]);
    const plusAssign = method('operator+=', lref(vec), [param('other', lref(named('record', 'const Vec', 'vec', { isConst: true })))]);
    const index = new CursorIndex([unit('vec.h', [vecStruct, plusAssign])]);
    const node = specialize(plusAssign, index);

    expect(node.unsupportedReason()).toBe("operator 'operator+=' has no Cython equivalent");
    expect(node.lines(contextFor(index))).toEqual(['#  Vec & operator+=(const Vec &)']);
  });

  it('comments out functions taking rvalue references', () => {
    const consume = fn('consume', builtin('void'), [param('value', rref(builtin('int')))]);
    expect(render(consume)).toEqual(['#  void consume(int &&)']);
  });

  it('comments out reserved names', () => {
    expect(render(fn('lambda', builtin('int')))).toEqual(['#  int lambda()']);
  });
});

describe('data rendering', () => {
  it('degrades unnamed anonymous aggregates', () => {
    const anonymous = struct('', 'anon', [field('x', builtin('int'))]);
    const record = named('elaborated', 'struct (anonymous)', 'anon');
    expect(render(variable('handle', pointer(record)), [anonymous])).toEqual(['void* handle']);
    expect(render(variable('blob', { ...record, sizeBytes: 8 }), [anonymous])).toEqual(['char blob[8]']);
  });

  it('comments out unsupported types with the raw spelling', () => {
    expect(render(variable('ref', rref(builtin('int'))))).toEqual(['#  int && ref']);
  });
});

describe('enum rendering', () => {
  it('renders constants with values', () => {
    expect(render(enumeration('Color', 'color', [['RED', 0], ['GREEN', 1]]))).toEqual([
      'enum Color:',
      '    RED = 0',
      '    GREEN = 1'
    ]);
  });

  it('writes values beyond the safe integer range verbatim', () => {
    expect(render(enumeration('Mask', 'mask', [['NONE', 0], ['ALL', '18446744073709551615']]))).toEqual([
      'enum Mask:',
      '    NONE = 0',
      '    ALL = 18446744073709551615'
    ]);
  });

  it('renders scoped and empty enums', () => {
    expect(render(enumeration('Mode', 'mode', [], { isScoped: true }))).toEqual(['enum class Mode:', '    pass']);
  });
});

describe('aggregate rendering', () => {
  it('chooses struct or cppclass headers', () => {
    expect(render(struct('Plain', 'plain', [field('x', builtin('int'))]))).toEqual(['struct Plain:']);
    expect(render(struct('Active', 'active', [method('run', builtin('void'))]))).toEqual(['cppclass Active:']);
  });

  it('renders base classes', () => {
    const base = cursor('CLASS_DECL', 'Shape', { id: 'shape', isDefinition: true, children: [method('area', builtin('double'))] });
    const derived = cursor('CLASS_DECL', 'Circle', {
      id: 'circle',
      isDefinition: true,
      children: [cursor('CXX_BASE_SPECIFIER', 'Shape', { access: 'public', type: named('record', 'Shape', 'shape') })]
    });
    expect(render(derived, [base])).toEqual(['cppclass Circle(Shape):']);
  });

  it('renders forward declarations as one-line stubs', () => {
    expect(render(struct('Opaque', 'opaque', [], { isDefinition: false }))).toEqual(['struct Opaque']);
    expect(render(cursor('UNION_DECL', 'Cell', { isDefinition: false }))).toEqual(['union Cell']);
  });
});

describe('typedef rendering', () => {
  it('keeps function pointer parameter lists', () => {
    const callback = typedef('callback_t', 'cb', pointer(proto(builtin('int'), [pointer(builtin('void'))])));
    expect(render(callback)).toEqual(['ctypedef int (*callback_t)(void*)']);
  });

  it('maps va_list to a void pointer', () => {
    expect(render(typedef('va_list', 'va', named('typedef', '__builtin_va_list')))).toEqual(['ctypedef void* va_list']);
  });

  it('renders an anonymous aggregate under the typedef name', () => {
    const anonymous = struct('', 'pt', [field('x', builtin('int'))]);
    expect(render(typedef('Point', 'point', named('elaborated', 'struct Point', 'pt')), [anonymous])).toEqual(['ctypedef struct Point:']);
  });

  it('detects typedefs that restate a tag name', () => {
    const tagged = struct('Node', 'node', [field('value', builtin('int'))]);
    const alias = typedef('Node', 'node_t', named('elaborated', 'struct Node', 'node'));
    const index = new CursorIndex([unit('node.h', [tagged, alias])]);
    const node = specialize(alias, index);
    expect(node.variant === 'typedef' && node.isRedundant).toBe(true);
  });
});

describe('macro rendering', () => {
  const macro = (tokens: string[], extra: Partial<RawCursor> = {}): RawCursor =>
    cursor('MACRO_DEFINITION', tokens[0], { tokens, ...extra });

  it('picks the constant type from the literal', () => {
    expect(render(macro(['BUFFER_SIZE', '4096']))).toEqual(['const long BUFFER_SIZE']);
    expect(render(macro(['RATIO', '0.75f']))).toEqual(['const double RATIO']);
    expect(render(macro(['GREETING', '"hello"']))).toEqual(['const char* GREETING']);
    expect(render(macro(['MASK', '(', '0x0F', ')']))).toEqual(['const long MASK']);
    expect(render(macro(['FLAGS', '(', 'A', '|', 'B', ')']))).toEqual(['const int FLAGS']);
  });

  it('renders function-like macros with an ellipsis', () => {
    const square = macro(['SQUARE', '(', 'x', ')', '(', '(', 'x', ')', '*', '(', 'x', ')', ')'], { isMacroFunction: true });
    const index = new CursorIndex([unit('m.h', [square])]);
    const node = specialize(square, index);
    expect(node.variant === 'macro' && node.body).toBe('(x)*(x)');
    expect(node.lines(contextFor(index))).toEqual(['const int SQUARE(...)']);
  });
});
