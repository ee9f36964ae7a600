/**
 * Token 类型定义
 */
export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

export enum TokenType {
  // Keywords
  KEYWORD,
  // Identifiers
  IDENTIFIER,
  // Literals
  NUMBER,
  BOOLEAN,
  // Operators
  OPERATOR,
  // Parentheses
  LPAREN,
  RPAREN,
  LBRACE,
  RBRACE,
  // Statement terminator
  SEMICOLON,
  // End of file
  EOF,
}

export const KEYWORDS: ReadonlySet<string> = new Set(['if', 'else']);
