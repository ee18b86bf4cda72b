import JavaScript from 'tree-sitter-javascript';
import type Parser from 'tree-sitter';
import type { FunctionKind } from '../../types.js';
import type { LanguageDefinition } from './types.js';
import type { FunctionTraverser } from '../traversers/types.js';
import { ANONYMOUS_NAME } from '../../constants.js';

// =============================================================================
// TRAVERSERS
// =============================================================================

/**
 * TypeScript/JavaScript scope traverser
 *
 * Both languages share the same function and class node types
 * (tree-sitter-typescript extends tree-sitter-javascript).
 *
 * Anonymous functions take the name of whatever they are assigned to:
 * - const handler = () => {}          → handler
 * - { onClick: function () {} }       → onClick
 * - class A { run = () => {} }        → run
 * - exports.load = async () => {}     → load
 */
export class TypeScriptTraverser implements FunctionTraverser {
  functionTypes = [
    'function_declaration',
    'generator_function_declaration',
    'function_expression',
    'function',
    'generator_function',
    'arrow_function',
    'method_definition',
  ];

  classTypes = [
    'class_declaration',
    'abstract_class_declaration',
    'class',
  ];

  getFunctionName(node: Parser.SyntaxNode): string {
    return node.childForFieldName('name')?.text ?? this.findAssignedName(node) ?? ANONYMOUS_NAME;
  }

  getClassName(node: Parser.SyntaxNode): string {
    return node.childForFieldName('name')?.text ?? this.findAssignedName(node) ?? ANONYMOUS_NAME;
  }

  getFunctionKind(_node: Parser.SyntaxNode, insideClass: boolean): FunctionKind {
    return insideClass ? 'method' : 'function';
  }

  /**
   * Look at the parent of an unnamed function or class to find the
   * binding it is stored in.
   */
  private findAssignedName(node: Parser.SyntaxNode): string | null {
    const parent = node.parent;
    if (!parent) return null;

    switch (parent.type) {
      case 'variable_declarator':
        return this.identifierText(parent.childForFieldName('name'));
      case 'pair':
        return this.identifierText(parent.childForFieldName('key'));
      case 'public_field_definition':
        return this.identifierText(parent.childForFieldName('name'));
      case 'field_definition':
        return this.identifierText(parent.childForFieldName('property'));
      case 'assignment_expression':
        return this.assignmentTargetName(parent.childForFieldName('left'));
      default:
        return null;
    }
  }

  /**
   * `module.exports.foo = ...` is named after its last property so the
   * dotted qualified name stays a path of scopes.
   */
  private assignmentTargetName(left: Parser.SyntaxNode | null): string | null {
    if (!left) return null;
    if (left.type === 'member_expression') {
      return this.identifierText(left.childForFieldName('property'));
    }
    return this.identifierText(left);
  }

  private identifierText(node: Parser.SyntaxNode | null): string | null {
    if (!node) return null;
    // Destructuring patterns and computed keys have no single name
    if (node.type.endsWith('_pattern') || node.type === 'computed_property_name') return null;
    return node.text.replace(/^['"]|['"]$/g, '');
  }
}

/**
 * JavaScript uses the same traverser as TypeScript
 */
export class JavaScriptTraverser extends TypeScriptTraverser {}

/**
 * Decision points shared by every grammar in the JavaScript family.
 */
export const javascriptFamilyComplexity: LanguageDefinition['complexity'] = {
  decisionPoints: [
    'if_statement',
    'for_statement', 'for_in_statement', 'for_of_statement',
    'while_statement', 'do_statement',
    'switch_case',
    'catch_clause',
    'ternary_expression',
  ],
  booleanOperatorTypes: [
    'binary_expression',
  ],
  shortCircuitOperators: [
    '&&', '||', '??',
  ],
};

// =============================================================================
// LANGUAGE DEFINITION
// =============================================================================

export const javascriptDefinition: LanguageDefinition = {
  id: 'javascript',
  extensions: ['js', 'jsx', 'mjs', 'cjs'],
  grammar: JavaScript,
  traverser: new JavaScriptTraverser(),
  complexity: javascriptFamilyComplexity,
};
