/**
 * Boolean tag expression exports.
 */

// Types
export * from './types';

// Parsing
export { tokenize } from './lexer';
export { parseExpression } from './parser';
export { ExpressionCache } from './cache';

// Evaluation
export { evaluatePredicate, referencedTagNames } from './evaluator';

// Formatting
export { formatPredicate, quoteValue } from './format';
