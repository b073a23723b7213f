import type { SyntaxNode } from '../syntax.js';
import { nestingDepth } from './nesting.js';
import { countStatements, type StatementCountOptions } from './statements.js';

export { nestingDepth, NESTING_ENLARGER_KINDS } from './nesting.js';
export { countStatements } from './statements.js';
export type { StatementCountOptions } from './statements.js';

export const METRIC_TYPES = ['statements', 'nesting'] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

/** A pure function from a node to a non-negative score */
export type Metric = (node: SyntaxNode) => number;

export interface MetricOptions {
  statements?: StatementCountOptions;
}

/**
 * Resolve a metric by name, binding its options.
 */
export function getMetric(type: MetricType, options: MetricOptions = {}): Metric {
  switch (type) {
    case 'statements':
      return node => countStatements(node, options.statements);
    case 'nesting':
      return nestingDepth;
  }
}
