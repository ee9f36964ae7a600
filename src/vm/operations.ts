import {
  BooleanObject,
  IntegerObject,
  ObjectType,
  OpCode,
  TernObject,
  integer,
  nativeBoolToBooleanObject,
} from '../types';
import { RuntimeError } from '../common/errors';

export function applyBinary(op: OpCode, left: TernObject, right: TernObject): IntegerObject {
  if (left.type !== ObjectType.INTEGER || right.type !== ObjectType.INTEGER) {
    throw new RuntimeError(`unsupported types for binary operation: ${left.type} ${right.type}`);
  }
  return applyIntegerBinary(op, left.value, right.value);
}

function applyIntegerBinary(op: OpCode, left: bigint, right: bigint): IntegerObject {
  switch (op) {
    case OpCode.ADD:
      return integer(left + right);
    case OpCode.SUB:
      return integer(left - right);
    case OpCode.MUL:
      return integer(left * right);
    case OpCode.DIV:
      if (right === 0n) {
        throw new RuntimeError('division by zero');
      }
      // bigint division truncates toward zero
      return integer(left / right);
    default:
      throw new RuntimeError(`unknown integer operator: ${OpCode[op] ?? op}`);
  }
}

export function applyComparison(op: OpCode, left: TernObject, right: TernObject): BooleanObject {
  if (left.type === ObjectType.INTEGER && right.type === ObjectType.INTEGER) {
    return applyIntegerComparison(op, left.value, right.value);
  }

  switch (op) {
    case OpCode.EQUAL:
      return nativeBoolToBooleanObject(left === right);
    case OpCode.NOT_EQUAL:
      return nativeBoolToBooleanObject(left !== right);
    case OpCode.GREATER_THAN:
      throw new RuntimeError(`unsupported types for comparison: ${left.type} ${right.type}`);
    default:
      throw new RuntimeError(`unknown comparison operator: ${OpCode[op] ?? op}`);
  }
}

function applyIntegerComparison(op: OpCode, left: bigint, right: bigint): BooleanObject {
  switch (op) {
    case OpCode.EQUAL:
      return nativeBoolToBooleanObject(left === right);
    case OpCode.NOT_EQUAL:
      return nativeBoolToBooleanObject(left !== right);
    case OpCode.GREATER_THAN:
      return nativeBoolToBooleanObject(left > right);
    default:
      throw new RuntimeError(`unknown comparison operator: ${OpCode[op] ?? op}`);
  }
}
