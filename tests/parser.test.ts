import { ASTNodeType, ParseError } from '../src/tern';
import { formatNode, parse } from '../src/parser';

describe('Parser', () => {
  describe('operator precedence', () => {
    const cases: Array<[string, string]> = [
      ['1 + 2 * 3', '(1 + (2 * 3))'],
      ['50 / 2 * 2 + 10 - 2', '((((50 / 2) * 2) + 10) - 2)'],
      ['(1 + 2) * 3', '((1 + 2) * 3)'],
      ['1 < 2 == true', '((1 < 2) == true)'],
      ['3 > 5 != 1 < 2', '((3 > 5) != (1 < 2))'],
      ['-a * b', '((-a) * b)'],
      ['!true != false', '((!true) != false)'],
      ['!!true', '(!(!true))'],
    ];

    it.each(cases)('parses %s as %s', (code, expected) => {
      expect(formatNode(parse(code))).toBe(expected);
    });
  });

  it('parses conditionals as expressions', () => {
    expect(formatNode(parse('if (x > 1) { 10 } else { 20; 30 }'))).toBe(
      'if (x > 1) { 10 } else { 20; 30 }'
    );
    expect(formatNode(parse('(if (true) { 1 }) + 2'))).toBe('(if true { 1 } + 2)');
  });

  it('builds a program of expression statements', () => {
    const program = parse('1; 2 + 3\ntrue;');
    expect(program.type).toBe(ASTNodeType.PROGRAM);
    expect(program.body.map((stmt) => stmt.type)).toEqual([
      ASTNodeType.EXPRESSION_STATEMENT,
      ASTNodeType.EXPRESSION_STATEMENT,
      ASTNodeType.EXPRESSION_STATEMENT,
    ]);
    expect(program.body.map((stmt) => formatNode(stmt))).toEqual(['1', '(2 + 3)', 'true']);
  });

  it('keeps an empty program empty', () => {
    expect(parse('').body).toEqual([]);
  });

  it('stores integer literals as bigint and records positions', () => {
    const program = parse('\n  9223372036854775807');
    expect(program.body[0].expression).toEqual({
      type: ASTNodeType.INTEGER_LITERAL,
      value: 9223372036854775807n,
      line: 2,
      column: 3,
    });
  });

  it('rejects integers outside the signed 64-bit range', () => {
    expect(() => parse('9223372036854775808')).toThrow(
      'could not parse "9223372036854775808" as integer at line 1, column 1'
    );
  });

  it('reports a dangling operator', () => {
    expect(() => parse('1 +')).toThrow(
      new ParseError('Unexpected token in expression: end of input at line 1, column 4', 1, 4)
    );
  });

  it('reports an unclosed group', () => {
    expect(() => parse('(1 + 2')).toThrow('Expected RPAREN, but got end of input at line 1, column 7');
  });

  it('reports an unclosed block', () => {
    expect(() => parse('if (true) { 1')).toThrow(
      'Expected RBRACE "}", but got end of input at line 1, column 14'
    );
  });

  it('requires parentheses around a condition', () => {
    expect(() => parse('if true { 1 }')).toThrow('Expected LPAREN, but got BOOLEAN "true" at line 1, column 4');
  });

  it('limits expression nesting depth', () => {
    expect(formatNode(parse('('.repeat(255) + '1' + ')'.repeat(255)))).toBe('1');
    expect(() => parse('('.repeat(300) + '1' + ')'.repeat(300))).toThrow(
      new ParseError('expression nesting exceeds 256 levels at line 1, column 257', 1, 257)
    );
    expect(() => parse('-'.repeat(3000) + '1')).toThrow(
      'expression nesting exceeds 256 levels at line 1, column 257'
    );
  });
});
