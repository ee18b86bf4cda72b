import Python from 'tree-sitter-python';
import type Parser from 'tree-sitter';
import type { FunctionKind } from '../../types.js';
import type { LanguageDefinition } from './types.js';
import type { FunctionTraverser } from '../traversers/types.js';
import { LAMBDA_NAME } from '../../constants.js';

// =============================================================================
// TRAVERSER
// =============================================================================

/**
 * Python scope traverser
 *
 * Python has a simple structure compared to TypeScript/JavaScript:
 * - Functions are defined with 'def' or 'async def' (one node type)
 * - Decorators wrap the definition in a 'decorated_definition' node,
 *   which is walked like any other node so the inner 'def' keeps its own span
 * - Lambdas are the only anonymous functions
 */
export class PythonTraverser implements FunctionTraverser {
  functionTypes = [
    'function_definition',
    'lambda',
  ];

  classTypes = [
    'class_definition',
  ];

  getFunctionName(node: Parser.SyntaxNode): string {
    if (node.type === 'lambda') return LAMBDA_NAME;
    return node.childForFieldName('name')?.text ?? LAMBDA_NAME;
  }

  getClassName(node: Parser.SyntaxNode): string {
    return node.childForFieldName('name')?.text ?? 'class';
  }

  getFunctionKind(node: Parser.SyntaxNode, insideClass: boolean): FunctionKind {
    if (node.type === 'lambda') return 'lambda';
    return insideClass ? 'method' : 'function';
  }
}

// =============================================================================
// LANGUAGE DEFINITION
// =============================================================================

export const pythonDefinition: LanguageDefinition = {
  id: 'python',
  extensions: ['py'],
  grammar: Python,
  traverser: new PythonTraverser(),

  complexity: {
    decisionPoints: [
      'if_statement', 'elif_clause',
      'for_statement', 'while_statement',
      'except_clause', 'except_group_clause',
      'case_clause',
      'conditional_expression',
      // Comprehension filter: [x for x in xs if x]
      'if_clause',
    ],
    booleanOperatorTypes: [
      'boolean_operator',
    ],
    shortCircuitOperators: [
      'and', 'or',
    ],
    // Unguarded `case _:` is the match default, like a switch `default:`
    isCatchAllArm: node => node.type === 'case_clause' && /^case\s+_\s*:/.test(node.text),
  },
};
