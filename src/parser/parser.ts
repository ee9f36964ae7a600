import { Program, Token, TokenType } from '../types';
import { ParseError } from '../common/errors';
import {
  parseAtom,
  parseBooleanLiteral,
  parseComparison,
  parseEquality,
  parseExpression,
  parseIfExpression,
  parseIntegerLiteral,
  parseProduct,
  parseSum,
  parseUnary,
} from './expressions';
import { parseBlock, parseProgram, parseStatement } from './statements';

export const MAX_NESTING_DEPTH = 256;

/**
 * 语法分析器 - 将 token 流转换为 AST
 */
export class Parser {
  tokens: Token[];
  pos: number = 0;
  private depth: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Program {
    this.pos = 0;
    this.depth = 0;
    return this.parseProgram();
  }

  peek(): Token {
    const index = Math.min(this.pos, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      throw new ParseError('Unexpected end of input', 1, 1);
    }
    return token;
  }

  consume(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) this.pos++;
    return token;
  }

  match(type: TokenType, value?: string): boolean {
    const token = this.peek();
    if (token.type !== type) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  expect(type: TokenType, value?: string): Token {
    const token = this.peek();
    if (!this.match(type, value)) {
      throw this.error(`Expected ${TokenType[type]}${value ? ` "${value}"` : ''}, but got ${this.describe(token)}`, token);
    }
    return this.consume();
  }

  describe(token: Token): string {
    if (token.type === TokenType.EOF) return 'end of input';
    return `${TokenType[token.type]} "${token.value}"`;
  }

  /**
   * Runs a nested parse, failing with a ParseError instead of exhausting the call stack.
   */
  nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.error(`expression nesting exceeds ${MAX_NESTING_DEPTH} levels`, this.peek());
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  error(message: string, token: Token): ParseError {
    return new ParseError(`${message} at line ${token.line}, column ${token.column}`, token.line, token.column);
  }

  parseProgram = parseProgram;
  parseStatement = parseStatement;
  parseBlock = parseBlock;
  parseExpression = parseExpression;
  parseEquality = parseEquality;
  parseComparison = parseComparison;
  parseSum = parseSum;
  parseProduct = parseProduct;
  parseUnary = parseUnary;
  parseAtom = parseAtom;
  parseIntegerLiteral = parseIntegerLiteral;
  parseBooleanLiteral = parseBooleanLiteral;
  parseIfExpression = parseIfExpression;
}
