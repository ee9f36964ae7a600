import { ASTNode, ASTNodeType, Statement } from '../types';

/**
 * Renders an AST back to source with every infix and prefix expression parenthesized.
 */
export function formatNode(node: ASTNode): string {
  switch (node.type) {
    case ASTNodeType.PROGRAM:
      return node.body.map(formatNode).join('');
    case ASTNodeType.BLOCK_STATEMENT:
      return `{ ${formatStatements(node.body)} }`;
    case ASTNodeType.EXPRESSION_STATEMENT:
      return formatNode(node.expression);
    case ASTNodeType.INTEGER_LITERAL:
      return node.value.toString();
    case ASTNodeType.BOOLEAN_LITERAL:
      return String(node.value);
    case ASTNodeType.IDENTIFIER:
      return node.name;
    case ASTNodeType.PREFIX_EXPRESSION:
      return `(${node.operator}${formatNode(node.operand)})`;
    case ASTNodeType.INFIX_EXPRESSION:
      return `(${formatNode(node.left)} ${node.operator} ${formatNode(node.right)})`;
    case ASTNodeType.IF_EXPRESSION: {
      const head = `if ${formatNode(node.condition)} ${formatNode(node.consequence)}`;
      return node.alternative ? `${head} else ${formatNode(node.alternative)}` : head;
    }
    default: {
      const unreachable: never = node;
      throw new Error(`Unknown node: ${String(unreachable)}`);
    }
  }
}

function formatStatements(body: Statement[]): string {
  return body.map(formatNode).join('; ');
}
