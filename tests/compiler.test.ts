import { Compiler } from '../src/compiler_module';
import { parse } from '../src/parser';
import {
  ASTNodeType,
  Bytecode,
  CompileError,
  Expression,
  OpCode,
  Program,
  Statement,
  concatInstructions,
  disassemble,
  encode,
} from '../src/tern';

const compileSource = (code: string): Bytecode => new Compiler().compile(parse(code));

const constantsOf = (bytecode: Bytecode) => bytecode.constants.map((c) => c.inspect());

const int = (value: number): Expression => ({ type: ASTNodeType.INTEGER_LITERAL, value: BigInt(value) });
const bool = (value: boolean): Expression => ({ type: ASTNodeType.BOOLEAN_LITERAL, value });
const stmt = (expression: Expression): Statement => ({ type: ASTNodeType.EXPRESSION_STATEMENT, expression });
const program = (...body: Statement[]): Program => ({ type: ASTNodeType.PROGRAM, body });

interface CompilerCase {
  code: string;
  constants: string[];
  instructions: Uint8Array[];
}

const runCases = (cases: CompilerCase[]) => {
  it.each(cases)('compiles $code', ({ code, constants, instructions }) => {
    const bytecode = compileSource(code);
    expect(disassemble(bytecode.instructions)).toBe(disassemble(concatInstructions(instructions)));
    expect(bytecode.instructions).toEqual(concatInstructions(instructions));
    expect(constantsOf(bytecode)).toEqual(constants);
  });
};

describe('Compiler', () => {
  describe('integer arithmetic', () => {
    runCases([
      {
        code: '1 + 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.ADD), encode(OpCode.DISCARD)],
      },
      {
        code: '1; 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.DISCARD), encode(OpCode.CONST, 1), encode(OpCode.DISCARD)],
      },
      {
        code: '1 - 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.SUB), encode(OpCode.DISCARD)],
      },
      {
        code: '1 * 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.MUL), encode(OpCode.DISCARD)],
      },
      {
        code: '2 / 1',
        constants: ['2', '1'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.DIV), encode(OpCode.DISCARD)],
      },
      {
        code: '1 + 1',
        constants: ['1', '1'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.ADD), encode(OpCode.DISCARD)],
      },
    ]);
  });

  describe('boolean expressions', () => {
    runCases([
      { code: 'true', constants: [], instructions: [encode(OpCode.TRUE), encode(OpCode.DISCARD)] },
      { code: 'false', constants: [], instructions: [encode(OpCode.FALSE), encode(OpCode.DISCARD)] },
      {
        code: '1 > 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.GREATER_THAN), encode(OpCode.DISCARD)],
      },
      {
        code: '1 < 2',
        constants: ['2', '1'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.GREATER_THAN), encode(OpCode.DISCARD)],
      },
      {
        code: '1 == 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.EQUAL), encode(OpCode.DISCARD)],
      },
      {
        code: '1 != 2',
        constants: ['1', '2'],
        instructions: [encode(OpCode.CONST, 0), encode(OpCode.CONST, 1), encode(OpCode.NOT_EQUAL), encode(OpCode.DISCARD)],
      },
      {
        code: 'true == false',
        constants: [],
        instructions: [encode(OpCode.TRUE), encode(OpCode.FALSE), encode(OpCode.EQUAL), encode(OpCode.DISCARD)],
      },
    ]);

    it('compiles a < b exactly like b > a', () => {
      expect(compileSource('1 < 2')).toEqual(compileSource('2 > 1'));
      expect(compileSource('(1 + 2) < 4')).toEqual(compileSource('4 > (1 + 2)'));
    });
  });

  describe('conditionals', () => {
    it('patches both jumps for an if without else', () => {
      const bytecode = compileSource('if (true) { 10 }; 3333;');
      expect(disassemble(bytecode.instructions)).toBe(
        '0000 TRUE\n' +
        '0001 JUMP_IF_NOT_TRUTHY 10\n' +
        '0004 CONST 0\n' +
        '0007 JUMP 11\n' +
        '0010 NULL\n' +
        '0011 DISCARD\n' +
        '0012 CONST 1\n' +
        '0015 DISCARD\n'
      );
      expect(constantsOf(bytecode)).toEqual(['10', '3333']);
    });

    it('patches both jumps for an if with else', () => {
      const bytecode = compileSource('if (true) { 10 } else { 20 }; 3333;');
      expect(disassemble(bytecode.instructions)).toBe(
        '0000 TRUE\n' +
        '0001 JUMP_IF_NOT_TRUTHY 10\n' +
        '0004 CONST 0\n' +
        '0007 JUMP 13\n' +
        '0010 CONST 1\n' +
        '0013 DISCARD\n' +
        '0014 CONST 2\n' +
        '0017 DISCARD\n'
      );
      expect(constantsOf(bytecode)).toEqual(['10', '20', '3333']);
    });

    it('drops only the trailing DISCARD of a branch', () => {
      expect(disassemble(compileSource('if (true) { 1; 2 }').instructions)).toBe(
        '0000 TRUE\n' +
        '0001 JUMP_IF_NOT_TRUTHY 14\n' +
        '0004 CONST 0\n' +
        '0007 DISCARD\n' +
        '0008 CONST 1\n' +
        '0011 JUMP 15\n' +
        '0014 NULL\n' +
        '0015 DISCARD\n'
      );
    });

    it('lets an empty branch produce null', () => {
      expect(disassemble(compileSource('if (true) {}').instructions)).toBe(
        '0000 TRUE\n' +
        '0001 JUMP_IF_NOT_TRUTHY 8\n' +
        '0004 NULL\n' +
        '0005 JUMP 9\n' +
        '0008 NULL\n' +
        '0009 DISCARD\n'
      );
    });

    it('never leaves the placeholder operand behind', () => {
      const text = disassemble(compileSource('if (1 > 2) { if (false) { 1 } } else { 2 }').instructions);
      expect(text).not.toContain('9999');
    });
  });

  describe('errors', () => {
    it('rejects prefix expressions', () => {
      expect(() => compileSource('-1')).toThrow(
        new CompileError('unsupported expression: prefix operator - at line 1, column 1')
      );
    });

    it('rejects identifiers', () => {
      expect(() => compileSource('1 + x')).toThrow("unsupported expression: identifier 'x' at line 1, column 5");
    });

    it('rejects unknown infix operators', () => {
      const ast = program(stmt({ type: ASTNodeType.INFIX_EXPRESSION, operator: '%', left: int(1), right: int(2) }));
      expect(() => new Compiler().compile(ast)).toThrow(CompileError);
      expect(() => new Compiler().compile(ast)).toThrow('unknown operator %');
    });

    it('rejects more constants than a 2-byte operand can address', () => {
      const body = Array.from({ length: 65537 }, (_, i) => stmt(int(i)));
      expect(() => new Compiler().compile(program(...body))).toThrow('too many constants (limit 65536)');
    });

    it('rejects jump targets beyond the 2-byte range', () => {
      const consequence = Array.from({ length: 33000 }, () => stmt(bool(true)));
      const ast = program(
        stmt({
          type: ASTNodeType.IF_EXPRESSION,
          condition: bool(true),
          consequence: { type: ASTNodeType.BLOCK_STATEMENT, body: consequence },
        })
      );
      expect(() => new Compiler().compile(ast)).toThrow('jump target 66006 out of range');
    });
  });

  it('starts from an empty state on every compile', () => {
    const compiler = new Compiler();
    compiler.compile(parse('1; 2; 3'));
    const second = compiler.compile(parse('4'));
    expect(constantsOf(second)).toEqual(['4']);
    expect(disassemble(second.instructions)).toBe('0000 CONST 0\n0003 DISCARD\n');
  });

  it('hands out bytecode that later compiles cannot change', () => {
    const compiler = new Compiler();
    const first = compiler.compile(parse('1 + 2'));
    compiler.compile(parse('true'));
    expect(disassemble(first.instructions)).toBe('0000 CONST 0\n0003 CONST 1\n0006 ADD\n0007 DISCARD\n');
    expect(Object.isFrozen(first.constants)).toBe(true);
  });
});
