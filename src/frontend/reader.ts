import type {
  BinaryOperator,
  CompareOperator,
  ConstantValue,
  ExpressionNode,
  FunctionDefNode,
  StatementNode,
} from './ast.js';
import { BINARY_OPERATORS, COMPARE_OPERATORS } from './ast.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

type JsonObject = Record<string, unknown>;

class TreeReadError extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
    readonly path: string,
    readonly where?: { line: number; column: number },
  ) {
    super(message);
    this.name = 'TreeReadError';
  }
}

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function locationOf(obj: JsonObject): { line: number; column: number } | undefined {
  const { line, column } = obj;
  if (typeof line === 'number' && typeof column === 'number') return { line, column };
  return undefined;
}

function malformed(obj: JsonObject, path: string, message: string): never {
  throw new TreeReadError(DiagnosticIds.TreeParseError, message, path, locationOf(obj));
}

function unsupported(obj: JsonObject, path: string, message: string): never {
  throw new TreeReadError(DiagnosticIds.UnsupportedConstruct, message, path, locationOf(obj));
}

function expectObject(v: unknown, path: string): JsonObject {
  if (!isObject(v)) {
    throw new TreeReadError(DiagnosticIds.TreeParseError, `Expected a node object.`, path);
  }
  return v;
}

function stringField(obj: JsonObject, key: string, path: string): string {
  const v = obj[key];
  if (typeof v !== 'string' || v.length === 0) {
    malformed(obj, `${path}.${key}`, `Field "${key}" must be a non-empty string.`);
  }
  return v;
}

function arrayField(obj: JsonObject, key: string, path: string): unknown[] {
  const v = obj[key];
  if (v === undefined) return [];
  if (!Array.isArray(v)) malformed(obj, `${path}.${key}`, `Field "${key}" must be an array.`);
  return v;
}

function isIdentifier(s: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(s);
}

function identifierField(obj: JsonObject, key: string, path: string): string {
  const v = stringField(obj, key, path);
  if (!isIdentifier(v)) malformed(obj, `${path}.${key}`, `"${v}" is not a valid identifier.`);
  return v;
}

function binaryOperator(obj: JsonObject, path: string): BinaryOperator {
  const op = stringField(obj, 'op', path);
  const found = BINARY_OPERATORS.find((candidate) => candidate === op);
  if (!found) unsupported(obj, `${path}.op`, `Unsupported binary operator "${op}".`);
  return found;
}

function compareOperator(obj: JsonObject, path: string): CompareOperator {
  const op = stringField(obj, 'op', path);
  const found = COMPARE_OPERATORS.find((candidate) => candidate === op);
  if (!found) unsupported(obj, `${path}.op`, `Unsupported comparison operator "${op}".`);
  return found;
}

function constantValue(obj: JsonObject, path: string): ConstantValue {
  const v = obj.value;
  if (v === null || typeof v === 'string' || typeof v === 'boolean') return v;
  if (typeof v === 'number') {
    if (!Number.isSafeInteger(v)) {
      unsupported(obj, `${path}.value`, `Only integer constants are supported (got ${v}).`);
    }
    return v;
  }
  return malformed(obj, `${path}.value`, `Constant value must be a number, string, boolean or null.`);
}

function at(obj: JsonObject): { line?: number; column?: number } {
  return locationOf(obj) ?? {};
}

function readExpression(raw: unknown, path: string): ExpressionNode {
  const obj = expectObject(raw, path);
  const kind = stringField(obj, 'kind', path);
  switch (kind) {
    case 'Constant':
      return { kind: 'Constant', value: constantValue(obj, path), ...at(obj) };
    case 'NameRef':
      return { kind: 'NameRef', name: identifierField(obj, 'name', path), ...at(obj) };
    case 'BinaryOp':
      return {
        kind: 'BinaryOp',
        op: binaryOperator(obj, path),
        left: readExpression(obj.left, `${path}.left`),
        right: readExpression(obj.right, `${path}.right`),
        ...at(obj),
      };
    case 'Compare':
      return {
        kind: 'Compare',
        op: compareOperator(obj, path),
        left: readExpression(obj.left, `${path}.left`),
        right: readExpression(obj.right, `${path}.right`),
        ...at(obj),
      };
    case 'ListLiteral':
      return {
        kind: 'ListLiteral',
        elements: arrayField(obj, 'elements', path).map((e, i) =>
          readExpression(e, `${path}.elements[${i}]`),
        ),
        ...at(obj),
      };
    case 'DictLiteral': {
      const keys = arrayField(obj, 'keys', path);
      const values = arrayField(obj, 'values', path);
      if (keys.length !== values.length) {
        malformed(obj, path, `DictLiteral has ${keys.length} keys but ${values.length} values.`);
      }
      return {
        kind: 'DictLiteral',
        keys: keys.map((k, i) => readExpression(k, `${path}.keys[${i}]`)),
        values: values.map((v, i) => readExpression(v, `${path}.values[${i}]`)),
        ...at(obj),
      };
    }
    case 'AttributeAccess':
      return {
        kind: 'AttributeAccess',
        value: readExpression(obj.value, `${path}.value`),
        attr: identifierField(obj, 'attr', path),
        ...at(obj),
      };
    case 'Subscript':
      return {
        kind: 'Subscript',
        value: readExpression(obj.value, `${path}.value`),
        index: readExpression(obj.index, `${path}.index`),
        ...at(obj),
      };
    case 'Call':
      return {
        kind: 'Call',
        callee: identifierField(obj, 'callee', path),
        args: arrayField(obj, 'args', path).map((a, i) => readExpression(a, `${path}.args[${i}]`)),
        ...at(obj),
      };
    default:
      return unsupported(obj, path, `Unsupported expression kind "${kind}".`);
  }
}

function readBody(obj: JsonObject, key: string, path: string): StatementNode[] {
  return arrayField(obj, key, path).map((s, i) => readStatement(s, `${path}.${key}[${i}]`));
}

function readFunctionDef(obj: JsonObject, path: string): FunctionDefNode {
  const params = arrayField(obj, 'params', path).map((p, i) => {
    if (typeof p !== 'string' || !isIdentifier(p)) {
      malformed(obj, `${path}.params[${i}]`, `Parameter names must be identifiers.`);
    }
    return p;
  });
  return {
    kind: 'FunctionDef',
    name: identifierField(obj, 'name', path),
    params,
    body: readBody(obj, 'body', path),
    ...at(obj),
  };
}

function readStatement(raw: unknown, path: string): StatementNode {
  const obj = expectObject(raw, path);
  const kind = stringField(obj, 'kind', path);
  switch (kind) {
    case 'FunctionDef':
      return readFunctionDef(obj, path);
    case 'Assign':
      return {
        kind: 'Assign',
        target: identifierField(obj, 'target', path),
        value: readExpression(obj.value, `${path}.value`),
        ...at(obj),
      };
    case 'AugAssign':
      return {
        kind: 'AugAssign',
        target: identifierField(obj, 'target', path),
        op: binaryOperator(obj, path),
        value: readExpression(obj.value, `${path}.value`),
        ...at(obj),
      };
    case 'Return':
      if (obj.value === undefined || obj.value === null) return { kind: 'Return', ...at(obj) };
      return { kind: 'Return', value: readExpression(obj.value, `${path}.value`), ...at(obj) };
    case 'If':
      return {
        kind: 'If',
        test: readExpression(obj.test, `${path}.test`),
        body: readBody(obj, 'body', path),
        orelse: readBody(obj, 'orelse', path),
        ...at(obj),
      };
    case 'While':
      return {
        kind: 'While',
        test: readExpression(obj.test, `${path}.test`),
        body: readBody(obj, 'body', path),
        ...at(obj),
      };
    case 'ExprStatement':
      return { kind: 'ExprStatement', value: readExpression(obj.value, `${path}.value`), ...at(obj) };
    default:
      return unsupported(obj, path, `Unsupported statement kind "${kind}".`);
  }
}

/**
 * Read a JSON-encoded tree: an array of top-level `FunctionDef` nodes, or an object whose `body`
 * holds that array.
 *
 * Returns `undefined` after pushing a diagnostic when the tree is malformed or contains a node kind
 * the engine has no lowering rule for.
 */
export function readTree(
  file: string,
  text: string,
  diagnostics: Diagnostic[],
): FunctionDefNode[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.TreeParseError,
      severity: 'error',
      message: `Input is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      file,
    });
    return undefined;
  }

  try {
    const top = isObject(parsed) ? parsed.body : parsed;
    if (!Array.isArray(top)) {
      throw new TreeReadError(
        DiagnosticIds.TreeParseError,
        `Expected an array of FunctionDef nodes.`,
        '$',
      );
    }
    return top.map((item, i) => {
      const path = `$[${i}]`;
      const obj = expectObject(item, path);
      if (obj.kind !== 'FunctionDef') {
        unsupported(obj, path, `Top-level node must be a FunctionDef (got "${String(obj.kind)}").`);
      }
      return readFunctionDef(obj, path);
    });
  } catch (err) {
    if (!(err instanceof TreeReadError)) throw err;
    diagnostics.push({
      id: err.id,
      severity: 'error',
      message: err.message,
      file,
      path: err.path,
      ...(err.where ? { line: err.where.line, column: err.where.column } : {}),
    });
    return undefined;
  }
}
