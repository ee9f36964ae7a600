import {
  Bytecode,
  FALSE,
  NULL,
  OpCode,
  TRUE,
  TernObject,
  decodeOperands,
  formatInstruction,
  formatOffset,
  lookup,
  readUint16,
} from '../types';
import { RuntimeError } from '../common/errors';
import { getConfig } from '../common/config';
import { applyBinary, applyComparison } from './operations';
import { isTruthy } from './truthy';

export interface VMOptions {
  /** Operand stack capacity. Defaults to TERN_STACK_SIZE or 2048. */
  stackSize?: number;
  /** Log every executed instruction to stderr. Defaults to TERN_TRACE. */
  trace?: boolean;
}

/**
 * 虚拟机 - 执行编译器生成的字节码
 */
export class VirtualMachine {
  private readonly instructions: Uint8Array;
  private readonly constants: readonly TernObject[];
  private readonly trace: boolean;

  // Slots at sp and above are stale; pop never clears them.
  private readonly stack: Array<TernObject | undefined>;
  private sp: number = 0;

  constructor(bytecode: Bytecode, options: VMOptions = {}) {
    const config = getConfig();
    this.instructions = bytecode.instructions;
    this.constants = bytecode.constants;
    this.trace = options.trace ?? config.trace;
    const stackSize = options.stackSize ?? config.stackSize;
    if (!Number.isInteger(stackSize) || stackSize <= 0) {
      throw new RuntimeError(`invalid stack size ${stackSize}`);
    }
    this.stack = new Array<TernObject | undefined>(stackSize).fill(undefined);
  }

  get stackPointer(): number {
    return this.sp;
  }

  stackTop(): TernObject | undefined {
    if (this.sp === 0) return undefined;
    return this.stack[this.sp - 1];
  }

  /**
   * The value most recently removed from the stack: the result of the last expression statement.
   */
  lastPoppedValue(): TernObject | undefined {
    return this.stack[this.sp];
  }

  run(): void {
    const ins = this.instructions;

    for (let ip = 0; ip < ins.length; ip++) {
      const op = ins[ip];

      if (this.trace) {
        this.traceInstruction(ip);
      }

      switch (op) {
        case OpCode.CONST: {
          const index = this.readOperand(ip);
          ip += 2;
          const value = this.constants[index];
          if (value === undefined) {
            throw new RuntimeError(`constant index ${index} out of range (pool size ${this.constants.length})`);
          }
          this.push(value);
          break;
        }

        case OpCode.DISCARD:
          this.pop();
          break;

        case OpCode.ADD:
        case OpCode.SUB:
        case OpCode.MUL:
        case OpCode.DIV: {
          const right = this.pop();
          const left = this.pop();
          this.push(applyBinary(op, left, right));
          break;
        }

        case OpCode.TRUE:
          this.push(TRUE);
          break;

        case OpCode.FALSE:
          this.push(FALSE);
          break;

        case OpCode.EQUAL:
        case OpCode.NOT_EQUAL:
        case OpCode.GREATER_THAN: {
          const right = this.pop();
          const left = this.pop();
          this.push(applyComparison(op, left, right));
          break;
        }

        case OpCode.JUMP: {
          const target = this.readOperand(ip);
          // the loop increment lands on target
          ip = target - 1;
          break;
        }

        case OpCode.JUMP_IF_NOT_TRUTHY: {
          const target = this.readOperand(ip);
          ip += 2;
          const condition = this.pop();
          if (!isTruthy(condition)) {
            ip = target - 1;
          }
          break;
        }

        case OpCode.NULL:
          this.push(NULL);
          break;

        default:
          throw new RuntimeError(`unknown opcode ${op} at ${formatOffset(ip)}`);
      }
    }
  }

  private readOperand(ip: number): number {
    if (ip + 2 >= this.instructions.length) {
      throw new RuntimeError(`truncated instruction at ${formatOffset(ip)}`);
    }
    return readUint16(this.instructions, ip + 1);
  }

  private push(value: TernObject): void {
    if (this.sp >= this.stack.length) {
      throw new RuntimeError('stack overflow');
    }
    this.stack[this.sp] = value;
    this.sp++;
  }

  private pop(): TernObject {
    if (this.sp === 0) {
      throw new RuntimeError('stack underflow');
    }
    const value = this.stack[this.sp - 1];
    if (value === undefined) {
      throw new RuntimeError(`empty stack slot ${this.sp - 1}`);
    }
    this.sp--;
    return value;
  }

  private traceInstruction(ip: number): void {
    let text: string;
    try {
      const def = lookup(this.instructions[ip]);
      const { operands } = decodeOperands(def, this.instructions, ip + 1);
      text = formatInstruction(def, operands);
    } catch (err) {
      text = `ERROR: ${err instanceof Error ? err.message : String(err)}`;
    }
    console.error(`[trace] ${formatOffset(ip)} ${text} (stack ${this.sp})`);
  }
}
