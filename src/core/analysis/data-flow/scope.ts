/**
 * Lexical scopes for variable resolution.
 *
 * @module
 */

import type { VariableNode } from "./interfaces.js";

/**
 * One level of bindings. A name can reach several bindings at once after
 * branches that all bind it are merged back into the enclosing scope.
 */
export class Scope {
  private readonly bindings = new Map<string, VariableNode[]>();

  constructor(readonly parent: Scope | null = null) {}

  child(): Scope {
    return new Scope(this);
  }

  /** Bindings reaching `name` from this scope or any enclosing one */
  lookup(name: string): VariableNode[] | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }

  /** Bindings of `name` made in this scope only */
  lookupOwn(name: string): VariableNode[] | undefined {
    return this.bindings.get(name);
  }

  bind(name: string, nodes: VariableNode[]): void {
    this.bindings.set(name, nodes);
  }

  ownNames(): string[] {
    return [...this.bindings.keys()];
  }

  /**
   * Makes the names bound in every branch visible here, each reaching the
   * binding of every branch.
   */
  mergeBranches(branches: readonly Scope[]): void {
    const [first] = branches;
    if (!first) return;

    for (const name of first.ownNames()) {
      if (this.lookup(name)) continue;
      const reaching: VariableNode[] = [];
      let boundEverywhere = true;
      for (const branch of branches) {
        const nodes = branch.lookupOwn(name);
        if (!nodes) {
          boundEverywhere = false;
          break;
        }
        reaching.push(...nodes);
      }
      if (boundEverywhere) {
        this.bind(name, reaching);
      }
    }
  }
}
