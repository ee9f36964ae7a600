export enum ASTNodeType {
  PROGRAM = 'Program',
  BLOCK_STATEMENT = 'BlockStatement',
  EXPRESSION_STATEMENT = 'ExpressionStatement',
  INTEGER_LITERAL = 'IntegerLiteral',
  BOOLEAN_LITERAL = 'BooleanLiteral',
  IDENTIFIER = 'Identifier',
  PREFIX_EXPRESSION = 'PrefixExpression',
  INFIX_EXPRESSION = 'InfixExpression',
  IF_EXPRESSION = 'IfExpression',
}

export interface BaseASTNode<T extends ASTNodeType = ASTNodeType> {
  type: T;
  // Source location, filled in by the parser
  line?: number;
  column?: number;
}

export interface Program extends BaseASTNode<ASTNodeType.PROGRAM> {
  body: Statement[];
}

export interface BlockStatement extends BaseASTNode<ASTNodeType.BLOCK_STATEMENT> {
  body: Statement[];
}

export interface ExpressionStatement extends BaseASTNode<ASTNodeType.EXPRESSION_STATEMENT> {
  expression: Expression;
}

export interface IntegerLiteral extends BaseASTNode<ASTNodeType.INTEGER_LITERAL> {
  value: bigint;
}

export interface BooleanLiteral extends BaseASTNode<ASTNodeType.BOOLEAN_LITERAL> {
  value: boolean;
}

export interface Identifier extends BaseASTNode<ASTNodeType.IDENTIFIER> {
  name: string;
}

export interface PrefixExpression extends BaseASTNode<ASTNodeType.PREFIX_EXPRESSION> {
  operator: string;
  operand: Expression;
}

export interface InfixExpression extends BaseASTNode<ASTNodeType.INFIX_EXPRESSION> {
  left: Expression;
  operator: string;
  right: Expression;
}

export interface IfExpression extends BaseASTNode<ASTNodeType.IF_EXPRESSION> {
  condition: Expression;
  consequence: BlockStatement;
  alternative?: BlockStatement;
}

export type Statement = ExpressionStatement;

export type Expression =
  | IntegerLiteral
  | BooleanLiteral
  | Identifier
  | PrefixExpression
  | InfixExpression
  | IfExpression;

export type ASTNode = Program | BlockStatement | Statement | Expression;
