// JSON AST loader: validates the front end's dump and builds RawTranslationUnit values

import { promises as fs } from 'fs';
import {
  AccessSpecifier, RawCursor, RawDiagnostic, RawTranslationUnit, RawType, StorageClass,
  isCursorKind, isTypeKind
} from '../types';
import { AstFormatError } from '../errors';

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class Reader {
  constructor(private readonly filename: string) {}

  fail(message: string, path: string): never {
    throw new AstFormatError(message, path, this.filename);
  }

  object(value: unknown, path: string): JsonObject {
    if (!isObject(value)) {
      this.fail('Expected an object', path);
    }
    return value;
  }

  array(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
      this.fail('Expected an array', path);
    }
    return value;
  }

  string(source: JsonObject, key: string, path: string): string {
    const value = source[key];
    if (typeof value !== 'string') {
      this.fail('Expected a string', `${path}.${key}`);
    }
    return value;
  }

  optionalString(source: JsonObject, key: string, path: string): string | undefined {
    return source[key] === undefined ? undefined : this.string(source, key, path);
  }

  optionalNumber(source: JsonObject, key: string, path: string): number | undefined {
    const value = source[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail('Expected a number', `${path}.${key}`);
    }
    return value;
  }

  optionalBoolean(source: JsonObject, key: string, path: string): boolean | undefined {
    const value = source[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      this.fail('Expected a boolean', `${path}.${key}`);
    }
    return value;
  }

  optionalStrings(source: JsonObject, key: string, path: string): string[] | undefined {
    if (source[key] === undefined) {
      return undefined;
    }
    return this.array(source[key], `${path}.${key}`).map((item, i) => {
      if (typeof item !== 'string') {
        this.fail('Expected a string', `${path}.${key}[${i}]`);
      }
      return item;
    });
  }
}

const ACCESS: readonly AccessSpecifier[] = ['public', 'protected', 'private', 'none'];
const STORAGE: readonly StorageClass[] = ['none', 'static', 'extern'];

function readAccess(reader: Reader, source: JsonObject, path: string): AccessSpecifier | undefined {
  const value = reader.optionalString(source, 'access', path);
  if (value === undefined) {
    return undefined;
  }
  const access = ACCESS.find(candidate => candidate === value);
  return access ?? reader.fail(`Unknown access specifier '${value}'`, `${path}.access`);
}

function readStorage(reader: Reader, source: JsonObject, path: string): StorageClass | undefined {
  const value = reader.optionalString(source, 'storage', path);
  if (value === undefined) {
    return undefined;
  }
  const storage = STORAGE.find(candidate => candidate === value);
  return storage ?? reader.fail(`Unknown storage class '${value}'`, `${path}.storage`);
}

function readTypeFields(reader: Reader, source: JsonObject, path: string): RawType {
  const kind = reader.string(source, 'kind', path);
  return {
    kind: isTypeKind(kind) ? kind : 'unexposed',
    spelling: reader.string(source, 'spelling', path),
    isConst: reader.optionalBoolean(source, 'isConst', path),
    arraySize: reader.optionalNumber(source, 'arraySize', path),
    declaration: reader.optionalString(source, 'declaration', path),
    isVariadic: reader.optionalBoolean(source, 'isVariadic', path),
    sizeBytes: reader.optionalNumber(source, 'sizeBytes', path)
  };
}

/**
 * Types nest through pointees, elements, results and argument lists; like
 * cursor trees they are read with an explicit stack.
 */
function readType(reader: Reader, value: unknown, path: string): RawType {
  const rootSource = reader.object(value, path);
  const root = readTypeFields(reader, rootSource, path);
  const pending: Array<{ type: RawType; source: JsonObject; path: string }> = [{ type: root, source: rootSource, path }];

  const nested = (item: unknown, itemPath: string): RawType => {
    const source = reader.object(item, itemPath);
    const type = readTypeFields(reader, source, itemPath);
    pending.push({ type, source, path: itemPath });
    return type;
  };

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) {
      break;
    }
    for (const key of ['pointee', 'element', 'result'] as const) {
      if (next.source[key] !== undefined) {
        next.type[key] = nested(next.source[key], `${next.path}.${key}`);
      }
    }
    for (const key of ['templateArguments', 'argumentTypes'] as const) {
      if (next.source[key] !== undefined) {
        const listPath = `${next.path}.${key}`;
        next.type[key] = reader.array(next.source[key], listPath).map((item, i) => nested(item, `${listPath}[${i}]`));
      }
    }
  }
  return root;
}

const DECIMAL = /^-?\d+$/;

/**
 * Enumerator values beyond the safe integer range (64-bit masks) travel as
 * decimal strings and are kept as text.
 */
function readEnumValue(reader: Reader, source: JsonObject, path: string): number | string | undefined {
  const value = source.enumValue;
  if (typeof value === 'string') {
    if (!DECIMAL.test(value)) {
      reader.fail('Expected a decimal integer string', `${path}.enumValue`);
    }
    return value;
  }
  const numeric = reader.optionalNumber(source, 'enumValue', path);
  if (numeric !== undefined && !Number.isSafeInteger(numeric)) {
    reader.fail('Enum value is not a safe integer; pass it as a decimal string', `${path}.enumValue`);
  }
  return numeric;
}

function readCursorFields(reader: Reader, source: JsonObject, path: string): RawCursor {
  const kind = reader.string(source, 'kind', path);
  const cursor: RawCursor = {
    id: reader.optionalString(source, 'id', path),
    kind: isCursorKind(kind) ? kind : 'UNEXPOSED_DECL',
    spelling: reader.string(source, 'spelling', path),
    displayName: reader.optionalString(source, 'displayName', path),
    file: reader.optionalString(source, 'file', path),
    access: readAccess(reader, source, path),
    isDefinition: reader.optionalBoolean(source, 'isDefinition', path),
    definition: reader.optionalString(source, 'definition', path),
    isAnonymous: reader.optionalBoolean(source, 'isAnonymous', path),
    isInlineNamespace: reader.optionalBoolean(source, 'isInlineNamespace', path),
    isScoped: reader.optionalBoolean(source, 'isScoped', path),
    storage: readStorage(reader, source, path),
    isStaticMethod: reader.optionalBoolean(source, 'isStaticMethod', path),
    isVariadic: reader.optionalBoolean(source, 'isVariadic', path),
    isMacroFunction: reader.optionalBoolean(source, 'isMacroFunction', path),
    exceptionSpec: reader.optionalString(source, 'exceptionSpec', path),
    tokens: reader.optionalStrings(source, 'tokens', path),
    enumValue: readEnumValue(reader, source, path),
    referenced: reader.optionalString(source, 'referenced', path)
  };

  for (const key of ['type', 'resultType', 'underlyingType'] as const) {
    if (source[key] !== undefined) {
      cursor[key] = readType(reader, source[key], `${path}.${key}`);
    }
  }
  return cursor;
}

/**
 * Cursor trees can be deep, so they are read with an explicit stack.
 */
function readCursor(reader: Reader, value: unknown, path: string): RawCursor {
  const root = readCursorFields(reader, reader.object(value, path), path);
  const pending: Array<{ cursor: RawCursor; source: JsonObject; path: string }> = [
    { cursor: root, source: reader.object(value, path), path }
  ];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) {
      break;
    }
    if (next.source.children === undefined) {
      continue;
    }
    const childrenPath = `${next.path}.children`;
    const children = reader.array(next.source.children, childrenPath);
    next.cursor.children = children.map((child, i) => {
      const childPath = `${childrenPath}[${i}]`;
      const source = reader.object(child, childPath);
      const cursor = readCursorFields(reader, source, childPath);
      pending.push({ cursor, source, path: childPath });
      return cursor;
    });
  }
  return root;
}

function readDiagnostic(reader: Reader, value: unknown, path: string): RawDiagnostic {
  const source = reader.object(value, path);
  const severity = reader.optionalNumber(source, 'severity', path);
  if (severity === undefined) {
    reader.fail('Expected a number', `${path}.severity`);
  }
  return {
    severity,
    message: reader.string(source, 'message', path),
    file: reader.optionalString(source, 'file', path),
    line: reader.optionalNumber(source, 'line', path),
    column: reader.optionalNumber(source, 'column', path)
  };
}

/**
 * Validates an already parsed document. `fallbackFile` names the unit when
 * the document does not.
 */
export function parseTranslationUnit(document: unknown, fallbackFile: string): RawTranslationUnit {
  const reader = new Reader(fallbackFile);
  const source = reader.object(document, '$');
  const file = reader.optionalString(source, 'file', '$') ?? fallbackFile;
  const cursor = readCursor(reader, source.cursor, '$.cursor');
  if (cursor.kind !== 'TRANSLATION_UNIT') {
    reader.fail(`Expected a TRANSLATION_UNIT cursor, got '${cursor.kind}'`, '$.cursor.kind');
  }

  const unit: RawTranslationUnit = { file, cursor };
  if (source.diagnostics !== undefined) {
    unit.diagnostics = reader
      .array(source.diagnostics, '$.diagnostics')
      .map((item, i) => readDiagnostic(reader, item, `$.diagnostics[${i}]`));
  }
  return unit;
}

export function parseTranslationUnitText(text: string, filename: string): RawTranslationUnit {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new AstFormatError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, '', filename);
  }
  return parseTranslationUnit(document, filename);
}

export async function loadTranslationUnit(filename: string): Promise<RawTranslationUnit> {
  const text = await fs.readFile(filename, 'utf-8');
  return parseTranslationUnitText(text, filename);
}
