/**
 * 运行时值定义
 *
 * Integers are allocated per value; booleans and null exist exactly once per
 * process and are compared by identity.
 */

export enum ObjectType {
  INTEGER = 'INTEGER',
  BOOLEAN = 'BOOLEAN',
  NULL = 'NULL',
}

export class IntegerObject {
  readonly type = ObjectType.INTEGER;
  readonly value: bigint;

  constructor(value: bigint) {
    // Signed 64-bit, wrapping
    this.value = BigInt.asIntN(64, value);
    Object.freeze(this);
  }

  inspect(): string {
    return this.value.toString();
  }
}

export class BooleanObject {
  readonly type = ObjectType.BOOLEAN;
  readonly value: boolean;

  private constructor(value: boolean) {
    this.value = value;
    Object.freeze(this);
  }

  static readonly TRUE = new BooleanObject(true);
  static readonly FALSE = new BooleanObject(false);

  inspect(): string {
    return this.value ? 'true' : 'false';
  }
}

export class NullObject {
  readonly type = ObjectType.NULL;

  private constructor() {
    Object.freeze(this);
  }

  static readonly INSTANCE = new NullObject();

  inspect(): string {
    return 'null';
  }
}

export type TernObject = IntegerObject | BooleanObject | NullObject;

export const TRUE = BooleanObject.TRUE;
export const FALSE = BooleanObject.FALSE;
export const NULL = NullObject.INSTANCE;

export function nativeBoolToBooleanObject(value: boolean): BooleanObject {
  return value ? TRUE : FALSE;
}

export function integer(value: bigint | number): IntegerObject {
  return new IntegerObject(typeof value === 'number' ? BigInt(value) : value);
}
