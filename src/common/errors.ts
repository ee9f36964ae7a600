import type { ASTNode } from '../types/ast';

/**
 * Base class of every error raised while lexing, parsing, compiling or running Tern code.
 */
export class TernError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ParseError extends TernError {
  line: number;
  column: number;

  constructor(message: string, line: number, column: number) {
    super(message);
    this.line = line;
    this.column = column;
  }
}

export class CompileError extends TernError {
  node?: ASTNode;

  constructor(message: string, node?: ASTNode) {
    super(node?.line !== undefined ? `${message} at line ${node.line}, column ${node.column ?? 0}` : message);
    this.node = node;
  }
}

export class RuntimeError extends TernError { }

/**
 * Raised when an instruction cannot be encoded or decoded.
 */
export class BytecodeError extends TernError { }
