export { VirtualMachine } from './vm';
export type { VMOptions } from './vm';
export { isTruthy } from './truthy';
export { applyBinary, applyComparison } from './operations';
