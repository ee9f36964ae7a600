import { ObjectType, TernObject } from '../types';

export function isTruthy(value: TernObject): boolean {
  switch (value.type) {
    case ObjectType.BOOLEAN:
      return value.value;
    case ObjectType.NULL:
      return false;
    case ObjectType.INTEGER:
      return true;
    default: {
      const unreachable: never = value;
      return Boolean(unreachable);
    }
  }
}
