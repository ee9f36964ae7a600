#!/usr/bin/env node

import * as fs from 'fs';
import { Tern } from './tern';
import { start } from './repl/repl';
import { disassemble } from './types';

// 导出公共 API
export * from './tern';
export { Compiler, ConstantPool } from './compiler_module';
export { VirtualMachine } from './vm';
export { Lexer } from './lexer';
export { Parser, formatNode, parse } from './parser';
export { start as startRepl } from './repl/repl';

const USAGE = 'Usage: tern [--disassemble] <file.tern>';

export function main(args: string[]): number {
  const disassembleOnly = args[0] === '--disassemble';
  const filePath = disassembleOnly ? args[1] : args[0];

  if (filePath === undefined) {
    console.error(USAGE);
    return 1;
  }

  if (!fs.existsSync(filePath)) {
    console.error(`Error: File '${filePath}' not found`);
    return 1;
  }

  const tern = new Tern();

  try {
    if (disassembleOnly) {
      const bytecode = tern.compile(fs.readFileSync(filePath, 'utf-8'));
      process.stdout.write(disassemble(bytecode.instructions));
      bytecode.constants.forEach((value, index) => {
        console.log(`${index}: ${value.inspect()}`);
      });
    } else {
      console.log(tern.runFile(filePath).inspect());
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }

  return 0;
}

if (require.main === module) {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    start(process.stdin, process.stdout).catch((error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
  } else {
    process.exitCode = main(args);
  }
}
