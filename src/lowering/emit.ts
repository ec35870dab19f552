import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ExpressionNode, FunctionDefNode, StatementNode } from '../frontend/ast.js';
import type { CompileContext } from './context.js';
import { createContext } from './context.js';
import { lowerFunction } from './function.js';
import { imm, ins, label, reg } from './instructions.js';
import { LoweringError } from './state.js';
import type { CompiledUnit, LoweredProgram } from './unit.js';

export const ENTRY_STUB = '_start';

/** Linux x86-64 `exit` system call number. */
const SYS_EXIT = 60;

export interface LowerOptions {
  /** Zero-parameter function that the `_start` stub calls; its result becomes the exit status. */
  entry?: string;
}

function entryStub(entry: string): CompiledUnit {
  return {
    name: ENTRY_STUB,
    paramCount: 0,
    localCount: 0,
    lines: [
      { kind: 'label', name: ENTRY_STUB },
      ins('call', label(entry)),
      ins('mov', reg('rdi'), reg('rax')),
      ins('mov', reg('rax'), imm(SYS_EXIT)),
      ins('syscall'),
    ],
  };
}

function registerFunctions(
  ctx: CompileContext,
  functions: readonly FunctionDefNode[],
  file: string,
  diagnostics: Diagnostic[],
): void {
  functions.forEach((fn, i) => {
    if (ctx.functions.has(fn.name) || fn.name === ENTRY_STUB) {
      diagnostics.push({
        id: DiagnosticIds.DuplicateFunction,
        severity: 'error',
        message: `Duplicate function name "${fn.name}".`,
        file,
        path: `$[${i}]`,
        ...(fn.line !== undefined ? { line: fn.line } : {}),
        ...(fn.column !== undefined ? { column: fn.column } : {}),
      });
      return;
    }
    ctx.functions.set(fn.name, fn.params.length);
    ctx.taken.add(fn.name);
  });
}

function visitExpr(node: ExpressionNode, visit: (callee: string) => void): void {
  switch (node.kind) {
    case 'BinaryOp':
    case 'Compare':
      visitExpr(node.left, visit);
      visitExpr(node.right, visit);
      return;
    case 'ListLiteral':
      for (const e of node.elements) visitExpr(e, visit);
      return;
    case 'DictLiteral':
      for (const e of [...node.keys, ...node.values]) visitExpr(e, visit);
      return;
    case 'AttributeAccess':
      visitExpr(node.value, visit);
      return;
    case 'Subscript':
      visitExpr(node.value, visit);
      visitExpr(node.index, visit);
      return;
    case 'Call':
      visit(node.callee);
      for (const a of node.args) visitExpr(a, visit);
      return;
    default:
      return;
  }
}

function visitBody(body: readonly StatementNode[], visit: (callee: string) => void): void {
  for (const stmt of body) {
    switch (stmt.kind) {
      case 'FunctionDef':
        visitBody(stmt.body, visit);
        break;
      case 'If':
        visitExpr(stmt.test, visit);
        visitBody(stmt.body, visit);
        visitBody(stmt.orelse, visit);
        break;
      case 'While':
        visitExpr(stmt.test, visit);
        visitBody(stmt.body, visit);
        break;
      case 'Return':
        if (stmt.value) visitExpr(stmt.value, visit);
        break;
      case 'Assign':
      case 'AugAssign':
      case 'ExprStatement':
        visitExpr(stmt.value, visit);
        break;
      default:
        break;
    }
  }
}

/**
 * Claim the name of every callee defined outside the unit, so no generated label or global symbol
 * can take it before the call is lowered.
 */
function reserveExterns(ctx: CompileContext, functions: readonly FunctionDefNode[]): void {
  for (const fn of functions) {
    visitBody(fn.body, (callee) => {
      if (!ctx.functions.has(callee)) ctx.taken.add(callee);
    });
  }
}

function checkEntry(ctx: CompileContext, entry: string, file: string, diagnostics: Diagnostic[]): void {
  const arity = ctx.functions.get(entry);
  if (arity === undefined) {
    diagnostics.push({
      id: DiagnosticIds.EntryError,
      severity: 'error',
      message: `Entry function "${entry}" is not defined.`,
      file,
    });
  } else if (arity !== 0) {
    diagnostics.push({
      id: DiagnosticIds.EntryError,
      severity: 'error',
      message: `Entry function "${entry}" must take no parameters (takes ${arity}).`,
      file,
    });
  }
}

/**
 * Lower an ordered list of top-level functions into compiled units.
 *
 * Any hard error discards the whole unit: the result is `undefined` and `diagnostics` explains why.
 * The compilation context (label counter, globals, data) is created here and shared by every
 * function of this call only.
 */
export function lowerProgram(
  functions: readonly FunctionDefNode[],
  file: string,
  diagnostics: Diagnostic[],
  options: LowerOptions = {},
): LoweredProgram | undefined {
  const ctx = createContext();
  ctx.taken.add(ENTRY_STUB);
  const before = diagnostics.length;

  registerFunctions(ctx, functions, file, diagnostics);
  if (options.entry !== undefined) checkEntry(ctx, options.entry, file, diagnostics);
  if (diagnostics.slice(before).some((d) => d.severity === 'error')) return undefined;
  reserveExterns(ctx, functions);

  const units: CompiledUnit[] = [];
  for (const [i, fn] of functions.entries()) {
    try {
      units.push(lowerFunction(ctx, fn, `$[${i}]`));
    } catch (err) {
      if (!(err instanceof LoweringError)) throw err;
      const { node } = err;
      diagnostics.push({
        id: err.id,
        severity: 'error',
        message: err.message,
        file,
        path: err.path,
        ...(node?.line !== undefined ? { line: node.line } : {}),
        ...(node?.column !== undefined ? { column: node.column } : {}),
      });
      return undefined;
    }
  }

  if (options.entry !== undefined) units.push(entryStub(options.entry));

  return {
    units,
    globals: [...ctx.globals].map(([name, symbol]) => ({ name, symbol })),
    data: [...ctx.data],
    externs: [...ctx.externs],
    ...(options.entry !== undefined ? { entry: ENTRY_STUB } : {}),
  };
}
