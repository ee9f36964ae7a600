export { Compiler, compile } from './compiler';
export type { EmittedInstruction } from './compiler';
export { ConstantPool } from './constant-pool';
