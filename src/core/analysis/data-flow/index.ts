/**
 * Variable Flow Analysis Module
 *
 * Builds the data-flow graph of a clause group over variable occurrences.
 *
 * @module
 */

export * from "./interfaces.js";
export { Scope } from "./scope.js";
export { destinationKey, isSelfCall, mayMatch, SELF_KEY } from "./message-matching.js";
export { VariableFlowAnalyzer, analyzeGroup, normalizeEdges, subExpressions } from "./flow-analyzer.js";
