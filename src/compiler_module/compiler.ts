import {
  ASTNode,
  ASTNodeType,
  BlockStatement,
  Bytecode,
  Expression,
  IfExpression,
  InfixExpression,
  MAX_U16,
  OpCode,
  Program,
  encode,
  integer,
} from '../types';
import { CompileError } from '../common/errors';
import { ConstantPool } from './constant-pool';

/**
 * Operand written for a forward jump until its target is known.
 */
const PLACEHOLDER = 9999;

const ARITHMETIC_OPS: Readonly<Record<string, OpCode>> = {
  '+': OpCode.ADD,
  '-': OpCode.SUB,
  '*': OpCode.MUL,
  '/': OpCode.DIV,
};

const COMPARISON_OPS: Readonly<Record<string, OpCode>> = {
  '>': OpCode.GREATER_THAN,
  '==': OpCode.EQUAL,
  '!=': OpCode.NOT_EQUAL,
};

export interface EmittedInstruction {
  opcode: OpCode;
  position: number;
}

/**
 * 编译器 - 将 AST 编译为字节码
 */
export class Compiler {
  private instructions: number[] = [];
  private constants = new ConstantPool();

  // Removing the last instruction restores the previous one into its slot.
  private lastInstruction?: EmittedInstruction;
  private previousInstruction?: EmittedInstruction;

  compile(ast: Program): Bytecode {
    this.instructions = [];
    this.constants = new ConstantPool();
    this.lastInstruction = undefined;
    this.previousInstruction = undefined;

    this.visit(ast);
    return this.bytecode();
  }

  bytecode(): Bytecode {
    return {
      instructions: Uint8Array.from(this.instructions),
      constants: this.constants.toArray(),
    };
  }

  private visit(node: ASTNode): void {
    switch (node.type) {
      case ASTNodeType.PROGRAM:
      case ASTNodeType.BLOCK_STATEMENT:
        for (const stmt of node.body) {
          this.visit(stmt);
        }
        break;

      case ASTNodeType.EXPRESSION_STATEMENT:
        this.visit(node.expression);
        this.emit(OpCode.DISCARD);
        break;

      case ASTNodeType.INTEGER_LITERAL: {
        if (this.constants.size > MAX_U16) {
          throw new CompileError(`too many constants (limit ${MAX_U16 + 1})`, node);
        }
        const index = this.constants.add(integer(node.value));
        this.emit(OpCode.CONST, index);
        break;
      }

      case ASTNodeType.BOOLEAN_LITERAL:
        this.emit(node.value ? OpCode.TRUE : OpCode.FALSE);
        break;

      case ASTNodeType.INFIX_EXPRESSION:
        this.visitInfix(node);
        break;

      case ASTNodeType.IF_EXPRESSION:
        this.visitIf(node);
        break;

      case ASTNodeType.IDENTIFIER:
        throw new CompileError(`unsupported expression: identifier '${node.name}'`, node);

      case ASTNodeType.PREFIX_EXPRESSION:
        throw new CompileError(`unsupported expression: prefix operator ${node.operator}`, node);

      default: {
        const unreachable: never = node;
        throw new CompileError(`unsupported node: ${String(unreachable)}`);
      }
    }
  }

  private visitInfix(node: InfixExpression): void {
    // a < b is compiled as b > a, so the VM needs no less-than instruction
    if (node.operator === '<') {
      this.visit(node.right);
      this.visit(node.left);
      this.emit(OpCode.GREATER_THAN);
      return;
    }

    const opcode = ARITHMETIC_OPS[node.operator] ?? COMPARISON_OPS[node.operator];
    if (opcode === undefined) {
      throw new CompileError(`unknown operator ${node.operator}`, node);
    }

    this.visit(node.left);
    this.visit(node.right);
    this.emit(opcode);
  }

  private visitIf(node: IfExpression): void {
    this.visit(node.condition);

    const jumpNotTruthyPos = this.emit(OpCode.JUMP_IF_NOT_TRUTHY, PLACEHOLDER);

    this.visitBranch(node.consequence);

    const jumpPos = this.emit(OpCode.JUMP, PLACEHOLDER);
    this.patchJump(jumpNotTruthyPos, node);

    if (node.alternative) {
      this.visitBranch(node.alternative);
    } else {
      this.emit(OpCode.NULL);
    }

    this.patchJump(jumpPos, node);
  }

  /**
   * Compiles a branch of a conditional so that it leaves its last value on the stack.
   */
  private visitBranch(block: BlockStatement): void {
    if (block.body.length === 0) {
      this.emit(OpCode.NULL);
      return;
    }
    this.visit(block);
    if (this.lastInstructionIs(OpCode.DISCARD)) {
      this.removeLastInstruction();
    }
  }

  private emit(op: OpCode, ...operands: number[]): number {
    const position = this.addInstruction(encode(op, ...operands));
    this.setLastInstruction(op, position);
    return position;
  }

  private addInstruction(instruction: Uint8Array): number {
    const position = this.instructions.length;
    for (const byte of instruction) {
      this.instructions.push(byte);
    }
    return position;
  }

  private setLastInstruction(opcode: OpCode, position: number): void {
    this.previousInstruction = this.lastInstruction;
    this.lastInstruction = { opcode, position };
  }

  private lastInstructionIs(op: OpCode): boolean {
    return this.lastInstruction?.opcode === op;
  }

  private removeLastInstruction(): void {
    if (!this.lastInstruction) return;
    this.instructions.length = this.lastInstruction.position;
    this.lastInstruction = this.previousInstruction;
  }

  /**
   * Points the jump at `position` to the end of the instructions emitted so far.
   */
  private patchJump(position: number, node: Expression): void {
    const target = this.instructions.length;
    if (target > MAX_U16) {
      throw new CompileError(`jump target ${target} out of range`, node);
    }
    this.changeOperand(position, target);
  }

  private changeOperand(position: number, operand: number): void {
    // Operand width is fixed per opcode, so the bytes are overwritten in place
    const encoded = encode(this.instructions[position], operand);
    for (let i = 0; i < encoded.length; i++) {
      this.instructions[position + i] = encoded[i];
    }
  }
}

export function compile(ast: Program): Bytecode {
  return new Compiler().compile(ast);
}
