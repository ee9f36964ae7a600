import type { Parser } from './parser';
import { ASTNodeType, BlockStatement, Program, Statement, TokenType } from '../types';

export function parseProgram(this: Parser): Program {
  const body: Statement[] = [];
  while (!this.match(TokenType.EOF)) {
    body.push(this.parseStatement());
  }
  return { type: ASTNodeType.PROGRAM, body, line: 1, column: 1 };
}

export function parseStatement(this: Parser): Statement {
  const token = this.peek();
  const expression = this.parseExpression();
  if (this.match(TokenType.SEMICOLON)) {
    this.consume();
  }
  return {
    type: ASTNodeType.EXPRESSION_STATEMENT,
    expression,
    line: token.line,
    column: token.column,
  };
}

export function parseBlock(this: Parser): BlockStatement {
  const open = this.expect(TokenType.LBRACE);
  const body: Statement[] = [];
  while (!this.match(TokenType.RBRACE)) {
    if (this.match(TokenType.EOF)) {
      throw this.error('Expected RBRACE "}", but got end of input', this.peek());
    }
    body.push(this.parseStatement());
  }
  this.consume();
  return { type: ASTNodeType.BLOCK_STATEMENT, body, line: open.line, column: open.column };
}
