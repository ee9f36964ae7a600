import type { Parser } from './parser';
import {
  ASTNodeType,
  BlockStatement,
  BooleanLiteral,
  Expression,
  IfExpression,
  IntegerLiteral,
  TokenType,
} from '../types';

const INT64_MAX = (1n << 63n) - 1n;

export function parseExpression(this: Parser): Expression {
  return this.nested(() => this.parseEquality());
}

function parseLeftAssociative(
  parser: Parser,
  operators: readonly string[],
  next: () => Expression
): Expression {
  let left = next();
  while (operators.some((op) => parser.match(TokenType.OPERATOR, op))) {
    const token = parser.consume();
    const right = next();
    left = {
      type: ASTNodeType.INFIX_EXPRESSION,
      left,
      operator: token.value,
      right,
      line: token.line,
      column: token.column,
    };
  }
  return left;
}

export function parseEquality(this: Parser): Expression {
  return parseLeftAssociative(this, ['==', '!='], () => this.parseComparison());
}

export function parseComparison(this: Parser): Expression {
  return parseLeftAssociative(this, ['<', '>'], () => this.parseSum());
}

export function parseSum(this: Parser): Expression {
  return parseLeftAssociative(this, ['+', '-'], () => this.parseProduct());
}

export function parseProduct(this: Parser): Expression {
  return parseLeftAssociative(this, ['*', '/'], () => this.parseUnary());
}

export function parseUnary(this: Parser): Expression {
  if (this.match(TokenType.OPERATOR, '!') || this.match(TokenType.OPERATOR, '-')) {
    const token = this.consume();
    return {
      type: ASTNodeType.PREFIX_EXPRESSION,
      operator: token.value,
      operand: this.nested(() => this.parseUnary()),
      line: token.line,
      column: token.column,
    };
  }
  return this.parseAtom();
}

export function parseAtom(this: Parser): Expression {
  const token = this.peek();

  if (token.type === TokenType.NUMBER) return this.parseIntegerLiteral();
  if (token.type === TokenType.BOOLEAN) return this.parseBooleanLiteral();

  if (token.type === TokenType.IDENTIFIER) {
    this.consume();
    return { type: ASTNodeType.IDENTIFIER, name: token.value, line: token.line, column: token.column };
  }

  if (token.type === TokenType.LPAREN) {
    this.consume();
    const inner = this.parseExpression();
    this.expect(TokenType.RPAREN);
    return inner;
  }

  if (this.match(TokenType.KEYWORD, 'if')) return this.parseIfExpression();

  throw this.error(`Unexpected token in expression: ${this.describe(token)}`, token);
}

export function parseIntegerLiteral(this: Parser): IntegerLiteral {
  const token = this.expect(TokenType.NUMBER);
  const value = BigInt(token.value);
  if (value > INT64_MAX) {
    throw this.error(`could not parse "${token.value}" as integer`, token);
  }
  return { type: ASTNodeType.INTEGER_LITERAL, value, line: token.line, column: token.column };
}

export function parseBooleanLiteral(this: Parser): BooleanLiteral {
  const token = this.expect(TokenType.BOOLEAN);
  return {
    type: ASTNodeType.BOOLEAN_LITERAL,
    value: token.value === 'true',
    line: token.line,
    column: token.column,
  };
}

export function parseIfExpression(this: Parser): IfExpression {
  const token = this.expect(TokenType.KEYWORD, 'if');
  this.expect(TokenType.LPAREN);
  const condition = this.parseExpression();
  this.expect(TokenType.RPAREN);
  const consequence: BlockStatement = this.parseBlock();

  const node: IfExpression = {
    type: ASTNodeType.IF_EXPRESSION,
    condition,
    consequence,
    line: token.line,
    column: token.column,
  };

  if (this.match(TokenType.KEYWORD, 'else')) {
    this.consume();
    node.alternative = this.parseBlock();
  }

  return node;
}
