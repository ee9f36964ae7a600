import { KEYWORDS, Token, TokenType } from '../types';
import { ParseError } from '../common/errors';

const TWO_CHAR_OPERATORS = ['==', '!='];
const ONE_CHAR_OPERATORS = '+-*/!<>';
const DELIMITERS: ReadonlyMap<string, TokenType> = new Map([
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
  ['{', TokenType.LBRACE],
  ['}', TokenType.RBRACE],
  [';', TokenType.SEMICOLON],
]);

/**
 * 词法分析器 - 将源代码转换为 token 流
 */
export class Lexer {
  private code: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(code: string) {
    this.code = code;
  }

  tokenize(): Token[] {
    this.pos = 0;
    this.line = 1;
    this.column = 1;
    this.tokens = [];

    const push = (type: TokenType, value: string, line: number, column: number) => {
      this.tokens.push({ type, value, line, column });
    };

    const advance = (n: number = 1) => {
      for (let i = 0; i < n; i++) {
        if (this.code[this.pos] === '\n') {
          this.line++;
          this.column = 1;
        } else {
          this.column++;
        }
        this.pos++;
      }
    };

    const peek = (n: number = 0) => this.code[this.pos + n] || '';

    while (this.pos < this.code.length) {
      const char = peek();
      const line = this.line;
      const column = this.column;

      if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
        advance();
        continue;
      }

      if (char === '/' && peek(1) === '/') {
        while (this.pos < this.code.length && peek() !== '\n') {
          advance();
        }
        continue;
      }

      if (/[0-9]/.test(char)) {
        let num = '';
        while (this.pos < this.code.length && /[0-9]/.test(peek())) {
          num += peek();
          advance();
        }
        push(TokenType.NUMBER, num, line, column);
        continue;
      }

      if (/[A-Za-z_]/.test(char)) {
        let word = '';
        while (this.pos < this.code.length && /[A-Za-z0-9_]/.test(peek())) {
          word += peek();
          advance();
        }
        if (word === 'true' || word === 'false') {
          push(TokenType.BOOLEAN, word, line, column);
        } else if (KEYWORDS.has(word)) {
          push(TokenType.KEYWORD, word, line, column);
        } else {
          push(TokenType.IDENTIFIER, word, line, column);
        }
        continue;
      }

      const twoChar = char + peek(1);
      if (TWO_CHAR_OPERATORS.includes(twoChar)) {
        push(TokenType.OPERATOR, twoChar, line, column);
        advance(2);
        continue;
      }

      if (ONE_CHAR_OPERATORS.includes(char)) {
        push(TokenType.OPERATOR, char, line, column);
        advance();
        continue;
      }

      const delimiter = DELIMITERS.get(char);
      if (delimiter !== undefined) {
        push(delimiter, char, line, column);
        advance();
        continue;
      }

      throw new ParseError(`Unexpected character '${char}' at line ${line}, column ${column}`, line, column);
    }

    push(TokenType.EOF, '', this.line, this.column);
    return this.tokens;
  }
}
