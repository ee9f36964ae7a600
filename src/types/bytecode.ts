import { BytecodeError } from '../common/errors';
import type { TernObject } from './object';

/**
 * 字节码类型定义
 */
export interface Bytecode {
  instructions: Uint8Array;
  constants: readonly TernObject[];
}

export enum OpCode {
  // Loading
  CONST,

  // Stack operations
  DISCARD,

  // Binary operations
  ADD,
  SUB,
  MUL,
  DIV,

  // Literals without a constant pool entry
  TRUE,
  FALSE,

  // Comparison operations
  EQUAL,
  NOT_EQUAL,
  GREATER_THAN,

  // Jump operations
  JUMP_IF_NOT_TRUTHY,
  JUMP,

  NULL,
}

export interface Definition {
  name: string;
  operandWidths: readonly number[];
}

const definitions: ReadonlyMap<number, Definition> = new Map<number, Definition>([
  [OpCode.CONST, { name: 'CONST', operandWidths: [2] }],
  [OpCode.DISCARD, { name: 'DISCARD', operandWidths: [] }],
  [OpCode.ADD, { name: 'ADD', operandWidths: [] }],
  [OpCode.SUB, { name: 'SUB', operandWidths: [] }],
  [OpCode.MUL, { name: 'MUL', operandWidths: [] }],
  [OpCode.DIV, { name: 'DIV', operandWidths: [] }],
  [OpCode.TRUE, { name: 'TRUE', operandWidths: [] }],
  [OpCode.FALSE, { name: 'FALSE', operandWidths: [] }],
  [OpCode.EQUAL, { name: 'EQUAL', operandWidths: [] }],
  [OpCode.NOT_EQUAL, { name: 'NOT_EQUAL', operandWidths: [] }],
  [OpCode.GREATER_THAN, { name: 'GREATER_THAN', operandWidths: [] }],
  [OpCode.JUMP_IF_NOT_TRUTHY, { name: 'JUMP_IF_NOT_TRUTHY', operandWidths: [2] }],
  [OpCode.JUMP, { name: 'JUMP', operandWidths: [2] }],
  [OpCode.NULL, { name: 'NULL', operandWidths: [] }],
]);

/** Largest value a 2-byte operand can hold. */
export const MAX_U16 = 0xffff;

export function lookup(op: number): Definition {
  const def = definitions.get(op);
  if (!def) {
    throw new BytecodeError(`opcode ${op} undefined`);
  }
  return def;
}

/**
 * Total byte width of an instruction, opcode included.
 */
export function instructionWidth(def: Definition): number {
  return def.operandWidths.reduce((sum, width) => sum + width, 1);
}

export function encode(op: OpCode, ...operands: number[]): Uint8Array {
  const def = lookup(op);
  if (operands.length !== def.operandWidths.length) {
    throw new BytecodeError(
      `${def.name} expects ${def.operandWidths.length} operand(s), got ${operands.length}`
    );
  }

  const instruction = new Uint8Array(instructionWidth(def));
  instruction[0] = op;

  let offset = 1;
  operands.forEach((operand, i) => {
    const width = def.operandWidths[i];
    switch (width) {
      case 2:
        if (!Number.isInteger(operand) || operand < 0 || operand > MAX_U16) {
          throw new BytecodeError(`operand ${operand} of ${def.name} does not fit in 2 bytes`);
        }
        instruction[offset] = operand >> 8;
        instruction[offset + 1] = operand & 0xff;
        break;
      default:
        throw new BytecodeError(`unsupported operand width ${width}`);
    }
    offset += width;
  });

  return instruction;
}

export function readUint16(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

export interface DecodedOperands {
  operands: number[];
  bytesRead: number;
}

/**
 * Reads the operands of `def` starting at `offset`, which must point just past the opcode byte.
 */
export function decodeOperands(def: Definition, bytes: Uint8Array, offset: number = 0): DecodedOperands {
  const operands: number[] = [];
  let bytesRead = 0;

  for (const width of def.operandWidths) {
    if (offset + bytesRead + width > bytes.length) {
      throw new BytecodeError(`truncated operand for ${def.name} at offset ${offset + bytesRead}`);
    }
    switch (width) {
      case 2:
        operands.push(readUint16(bytes, offset + bytesRead));
        break;
      default:
        throw new BytecodeError(`unsupported operand width ${width}`);
    }
    bytesRead += width;
  }

  return { operands, bytesRead };
}

export function formatInstruction(def: Definition, operands: readonly number[]): string {
  if (operands.length !== def.operandWidths.length) {
    return `ERROR: operand len ${operands.length} does not match defined ${def.operandWidths.length}`;
  }
  return [def.name, ...operands.map(String)].join(' ');
}

export function formatOffset(offset: number): string {
  return String(offset).padStart(4, '0');
}

/**
 * Renders an instruction stream as `%04d NAME operands` lines.
 */
export function disassemble(bytes: Uint8Array): string {
  let out = '';
  let i = 0;

  while (i < bytes.length) {
    let def: Definition;
    try {
      def = lookup(bytes[i]);
    } catch (err) {
      out += `ERROR: ${err instanceof Error ? err.message : String(err)}\n`;
      i++;
      continue;
    }

    let decoded: DecodedOperands;
    try {
      decoded = decodeOperands(def, bytes, i + 1);
    } catch (err) {
      out += `ERROR: ${err instanceof Error ? err.message : String(err)}\n`;
      break;
    }

    out += `${formatOffset(i)} ${formatInstruction(def, decoded.operands)}\n`;
    i += 1 + decoded.bytesRead;
  }

  return out;
}

/**
 * Joins several encoded instructions into one stream.
 */
export function concatInstructions(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
