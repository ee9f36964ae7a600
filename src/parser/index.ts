import { Lexer } from '../lexer';
import { Program } from '../types';
import { Parser } from './parser';

export { MAX_NESTING_DEPTH, Parser } from './parser';
export { formatNode } from './format';

export function parse(source: string): Program {
  const tokens = new Lexer(source).tokenize();
  return new Parser(tokens).parse();
}
