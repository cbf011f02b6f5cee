/**
 * Token and syntax-tree types of the calibration expression language.
 *
 * The parser accepts a slightly wider grammar than the evaluator allows
 * (attribute access, subscripts, bitwise and `not` operators, displays)
 * so that the validator can reject those constructs by name.
 *
 * @module calibration/expr_types
 */

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export type TokenKind = 'number' | 'string' | 'name' | 'op' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Source text of the token (for strings, the unescaped contents). */
  text: string;
  /** Numeric value of a `number` token. */
  value?: number;
  /** Character offset of the token in the expression. */
  pos: number;
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export type ArithmeticOp = '+' | '-' | '*' | '/' | '//' | '%' | '**';

export type BitwiseOp = '&' | '|' | '^' | '<<' | '>>' | '@';

export type BinaryOp = ArithmeticOp | BitwiseOp;

export type UnaryOp = '+' | '-' | 'not' | '~';

export type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in' | 'is' | 'is not';

export type LogicalOp = 'and' | 'or';

// ---------------------------------------------------------------------------
// Syntax tree
// ---------------------------------------------------------------------------

/** A value the evaluator can produce. `null` is the `None` constant. */
export type ExprValue = number | string | boolean | null;

export interface LiteralNode {
  kind: 'literal';
  value: ExprValue;
}

export interface VariableNode {
  kind: 'variable';
  name: string;
}

export interface UnaryNode {
  kind: 'unary';
  op: UnaryOp;
  operand: ExprNode;
}

export interface BinaryNode {
  kind: 'binary';
  op: BinaryOp;
  left: ExprNode;
  right: ExprNode;
}

/** `a < b <= c` keeps every comparison of the chain. */
export interface CompareNode {
  kind: 'compare';
  first: ExprNode;
  rest: Array<{ op: CompareOp; operand: ExprNode }>;
}

export interface LogicalNode {
  kind: 'logical';
  op: LogicalOp;
  operands: ExprNode[];
}

/** `body if test else orelse` */
export interface ConditionalNode {
  kind: 'conditional';
  test: ExprNode;
  body: ExprNode;
  orelse: ExprNode;
}

export interface CallNode {
  kind: 'call';
  callee: ExprNode;
  args: ExprNode[];
}

export interface AttributeNode {
  kind: 'attribute';
  object: ExprNode;
  attr: string;
}

export interface SubscriptNode {
  kind: 'subscript';
  object: ExprNode;
  index: ExprNode;
}

/** Tuple or list display. */
export interface SequenceNode {
  kind: 'tuple' | 'list';
  items: ExprNode[];
}

export type ExprNode =
  | LiteralNode
  | VariableNode
  | UnaryNode
  | BinaryNode
  | CompareNode
  | LogicalNode
  | ConditionalNode
  | CallNode
  | AttributeNode
  | SubscriptNode
  | SequenceNode;

export type ExprNodeKind = ExprNode['kind'];
