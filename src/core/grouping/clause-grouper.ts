/**
 * Clause Grouper
 *
 * Partitions a module's function clauses into groups keyed by
 * (name, arity), in declaration order. All clauses of one key must form a
 * single contiguous run; a split key is reported and left out.
 *
 * @module
 */

import { NonContiguousClauseError } from "../errors.js";
import type { FunctionClause, FunctionForm } from "../parser/ast.js";

// =============================================================================
// Types
// =============================================================================

/**
 * All clauses of one function. Identity is `(module, name, arity)`.
 */
export interface ClauseGroup {
  module: string;
  name: string;
  arity: number;
  /** Clauses in source order */
  clauses: FunctionClause[];
}

export interface GroupingResult {
  groups: ClauseGroup[];
  errors: NonContiguousClauseError[];
}

// =============================================================================
// Grouping
// =============================================================================

export function groupKey(name: string, arity: number): string {
  return `${name}/${arity}`;
}

/**
 * Groups the clauses of `functions` by (name, arity).
 *
 * @example
 * ```typescript
 * const { groups, errors } = groupClauses("geometry", tree.functions);
 * groups.map((g) => `${g.name}/${g.arity}`); // ["area/1", "perimeter/1"]
 * ```
 */
export function groupClauses(module: string, functions: readonly FunctionForm[]): GroupingResult {
  const runs: ClauseGroup[] = [];
  let current: ClauseGroup | null = null;

  for (const form of functions) {
    for (const clause of form.clauses) {
      const arity = clause.params.length;
      if (current && current.name === clause.name && current.arity === arity) {
        current.clauses.push(clause);
        continue;
      }
      current = { module, name: clause.name, arity, clauses: [clause] };
      runs.push(current);
    }
  }

  const runsByKey = new Map<string, ClauseGroup[]>();
  for (const run of runs) {
    const key = groupKey(run.name, run.arity);
    const existing = runsByKey.get(key);
    if (existing) {
      existing.push(run);
    } else {
      runsByKey.set(key, [run]);
    }
  }

  const groups: ClauseGroup[] = [];
  const errors: NonContiguousClauseError[] = [];

  for (const [key, keyRuns] of runsByKey) {
    const [first] = keyRuns;
    if (!first) continue;

    if (keyRuns.length === 1) {
      groups.push(first);
      continue;
    }

    errors.push(
      new NonContiguousClauseError(`Clauses of ${module}:${key} are not contiguous`, {
        functionName: first.name,
        arity: first.arity,
        lines: keyRuns.map((run) => run.clauses[0]?.firstToken.line),
      })
    );
  }

  // Map iteration follows first appearance, which is declaration order
  return { groups, errors };
}
