import type Parser from 'tree-sitter';
import type { LanguageDefinition } from '../languages/types.js';

/**
 * Decision point lookup tables, built once per language definition.
 */
interface DecisionTable {
  decisionPoints: Set<string>;
  booleanOperatorTypes: Set<string>;
  shortCircuitOperators: Set<string>;
}

const tableCache = new WeakMap<LanguageDefinition, DecisionTable>();

function getDecisionTable(language: LanguageDefinition): DecisionTable {
  let table = tableCache.get(language);
  if (!table) {
    table = {
      decisionPoints: new Set(language.complexity.decisionPoints),
      booleanOperatorTypes: new Set(language.complexity.booleanOperatorTypes),
      shortCircuitOperators: new Set(language.complexity.shortCircuitOperators),
    };
    tableCache.set(language, table);
  }
  return table;
}

/**
 * Check whether a single node adds an execution path.
 *
 * Decision points: if, elif, loops, case arms, exception handlers,
 * conditional expressions, comprehension filters and short-circuit
 * operators (&&, ||, ??, and, or). Other binary operators never count,
 * and neither do catch-all arms (`default:`, `case _:`).
 */
export function isDecisionPoint(node: Parser.SyntaxNode, language: LanguageDefinition): boolean {
  const table = getDecisionTable(language);

  if (table.decisionPoints.has(node.type)) {
    return !(language.complexity.isCatchAllArm?.(node) ?? false);
  }

  if (table.booleanOperatorTypes.has(node.type)) {
    const operator = node.childForFieldName('operator');
    return operator !== null && table.shortCircuitOperators.has(operator.text);
  }

  return false;
}
