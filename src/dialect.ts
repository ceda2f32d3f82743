// C/C++ type spelling -> Cython spelling

import reservedWords from './reserved-words.json';

const THROWS = /throw\s*\([^)]*\)/;
const NOEXCEPT = /\bnoexcept(\s*\([^)]*\))?/g;
const STRIPPED_QUALIFIERS = /\b(?:__restrict__|__restrict|restrict|volatile|typename)\b\s*/g;

/**
 * Rewrites a C/C++ type spelling into Cython syntax: template brackets become
 * square brackets, a dynamic exception specification becomes `except +`,
 * `bool`/`_Bool` become `bint` and qualifiers Cython has no use for are dropped.
 *
 * Never pass a name that still needs namespace resolution; that is the
 * resolver's job.
 */
export function convertDialect(spelling: string): string {
  let result = spelling.replace(/</g, '[').replace(/>/g, ']');

  if (THROWS.test(result)) {
    result = result.replace(THROWS, 'except +');
  } else {
    result = result.replace(NOEXCEPT, '');
  }

  result = result
    .replace(/\b_Bool\b/g, 'bint')
    .replace(/\bbool\b/g, 'bint')
    .replace(STRIPPED_QUALIFIERS, '');

  return result.replace(/\s+/g, ' ').replace(/\s+([\],)])/g, '$1').trim();
}

const TAG_PREFIX = /^(?:const\s+)?(?:struct|enum|union|class)\s+/;

/**
 * Drops a leading `struct`/`enum`/`union`/`class` tag, keeping a leading `const`.
 */
export function stripTagPrefix(spelling: string): string {
  const match = TAG_PREFIX.exec(spelling);
  if (!match) {
    return spelling;
  }
  const keepConst = match[0].startsWith('const');
  return (keepConst ? 'const ' : '') + spelling.slice(match[0].length);
}

/**
 * Reduces a type spelling to the bare, possibly qualified, name the resolver
 * keys on: `const std::vector<int> &` -> `std::vector`.
 */
export function sanitizeTypeString(spelling: string): string {
  let result = spelling
    .replace(/\b(?:unsigned|signed|const|volatile)\s+/g, '')
    .replace(/^(?:struct|enum|union|class)\s+/, '');

  for (const stop of ['<', '[', '*', '&', '(']) {
    const index = result.indexOf(stop);
    if (index !== -1) {
      result = result.slice(0, index);
    }
  }

  return result.trim();
}

/**
 * Joins qualified-name segments the way module and alias names need them.
 */
export function flattenQualifiedName(qualifiedName: string, separator: string = '_'): string {
  return qualifiedName.split('::').filter(segment => segment.length > 0).join(separator);
}

const RESERVED = new Set<string>([...reservedWords.python, ...reservedWords.cython]);

/**
 * Names Cython cannot declare: Python keywords and Cython's own.
 */
export function isReservedName(name: string): boolean {
  return RESERVED.has(name);
}

// Operators an extern block cannot declare
const UNSUPPORTED_OPERATORS = new Set(['operator+=', 'operator-=', 'operator^=', 'operator&=', 'operator|=', 'operator->']);

export function isUnsupportedOperator(name: string): boolean {
  return UNSUPPORTED_OPERATORS.has(name) || name.startsWith('operator""');
}
