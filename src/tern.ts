/**
 * Tern - 主入口
 * 用于编译和执行 Tern 代码
 */

import * as fs from 'fs';
import { Lexer } from './lexer';
import { Parser } from './parser';
import { Compiler } from './compiler_module';
import { VirtualMachine, VMOptions } from './vm';
import { Bytecode, NULL, TernObject } from './types';

export class Tern {
  private options: VMOptions;

  constructor(options: VMOptions = {}) {
    this.options = options;
  }

  /**
   * 编译 Tern 代码
   * @param code Tern 源代码
   */
  compile(code: string): Bytecode {
    // 1. 词法分析
    const tokens = new Lexer(code).tokenize();

    // 2. 语法分析
    const ast = new Parser(tokens).parse();

    // 3. 编译到字节码
    return new Compiler().compile(ast);
  }

  /**
   * 编译并运行 Tern 代码
   * @returns 最后一个表达式的值
   */
  run(code: string): TernObject {
    const vm = new VirtualMachine(this.compile(code), this.options);
    vm.run();
    return vm.lastPoppedValue() ?? NULL;
  }

  runFile(filePath: string): TernObject {
    const code = fs.readFileSync(filePath, 'utf-8');
    return this.run(code);
  }
}

// 重新导出类型，供外部使用
export * from './types';
export * from './common/errors';
