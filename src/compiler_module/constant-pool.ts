import { TernObject } from '../types';

/**
 * Append-only list of values referenced by CONST operands. Entries are not deduplicated.
 */
export class ConstantPool {
  private values: TernObject[] = [];

  add(value: TernObject): number {
    this.values.push(value);
    return this.values.length - 1;
  }

  get size(): number {
    return this.values.length;
  }

  toArray(): readonly TernObject[] {
    return Object.freeze([...this.values]);
  }
}
