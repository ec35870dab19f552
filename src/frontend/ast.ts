/**
 * Syntax tree contracts consumed by the lowering engine.
 *
 * Trees are produced by an external parser and arrive as JSON (see `reader.ts`).
 * This module defines types only; nodes are read-only once produced.
 */

/**
 * Base shape for all tree nodes.
 */
export interface BaseNode {
  readonly kind: string;
  /** 1-based source line recorded by the parser, when known. */
  readonly line?: number;
  /** 1-based source column recorded by the parser, when known. */
  readonly column?: number;
}

export type BinaryOperator = 'Add' | 'Sub' | 'Mult' | 'Div' | 'Mod';

export type CompareOperator = 'Gt' | 'Lt' | 'Eq' | 'GtE' | 'LtE' | 'NotEq';

export const BINARY_OPERATORS: readonly BinaryOperator[] = ['Add', 'Sub', 'Mult', 'Div', 'Mod'];

export const COMPARE_OPERATORS: readonly CompareOperator[] = [
  'Gt',
  'Lt',
  'Eq',
  'GtE',
  'LtE',
  'NotEq',
];

/**
 * Top-level function definition.
 */
export interface FunctionDefNode extends BaseNode {
  readonly kind: 'FunctionDef';
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly StatementNode[];
}

export interface AssignNode extends BaseNode {
  readonly kind: 'Assign';
  readonly target: string;
  readonly value: ExpressionNode;
}

/**
 * `target op= value`, lowered as `target = target op value`.
 */
export interface AugAssignNode extends BaseNode {
  readonly kind: 'AugAssign';
  readonly target: string;
  readonly op: BinaryOperator;
  readonly value: ExpressionNode;
}

export interface ReturnNode extends BaseNode {
  readonly kind: 'Return';
  readonly value?: ExpressionNode;
}

export interface IfNode extends BaseNode {
  readonly kind: 'If';
  readonly test: ExpressionNode;
  readonly body: readonly StatementNode[];
  readonly orelse: readonly StatementNode[];
}

export interface WhileNode extends BaseNode {
  readonly kind: 'While';
  readonly test: ExpressionNode;
  readonly body: readonly StatementNode[];
}

/**
 * Expression evaluated for its effect (typically a call); the value is discarded.
 */
export interface ExprStatementNode extends BaseNode {
  readonly kind: 'ExprStatement';
  readonly value: ExpressionNode;
}

export type StatementNode =
  | FunctionDefNode
  | AssignNode
  | AugAssignNode
  | ReturnNode
  | IfNode
  | WhileNode
  | ExprStatementNode;

export interface BinaryOpNode extends BaseNode {
  readonly kind: 'BinaryOp';
  readonly op: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface CompareNode extends BaseNode {
  readonly kind: 'Compare';
  readonly op: CompareOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface ListLiteralNode extends BaseNode {
  readonly kind: 'ListLiteral';
  readonly elements: readonly ExpressionNode[];
}

export interface DictLiteralNode extends BaseNode {
  readonly kind: 'DictLiteral';
  readonly keys: readonly ExpressionNode[];
  readonly values: readonly ExpressionNode[];
}

/**
 * `value.attr`: looks `attr` up as a key of the pair list `value` evaluates to.
 */
export interface AttributeAccessNode extends BaseNode {
  readonly kind: 'AttributeAccess';
  readonly value: ExpressionNode;
  readonly attr: string;
}

/**
 * `value[index]` over a list region.
 */
export interface SubscriptNode extends BaseNode {
  readonly kind: 'Subscript';
  readonly value: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly kind: 'Call';
  readonly callee: string;
  readonly args: readonly ExpressionNode[];
}

export interface NameRefNode extends BaseNode {
  readonly kind: 'NameRef';
  readonly name: string;
}

export type ConstantValue = number | string | boolean | null;

export interface ConstantNode extends BaseNode {
  readonly kind: 'Constant';
  readonly value: ConstantValue;
}

export type ExpressionNode =
  | BinaryOpNode
  | CompareNode
  | ListLiteralNode
  | DictLiteralNode
  | AttributeAccessNode
  | SubscriptNode
  | CallNode
  | NameRefNode
  | ConstantNode;
