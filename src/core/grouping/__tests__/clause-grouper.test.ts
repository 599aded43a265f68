/**
 * Clause Grouper Tests
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, NonContiguousClauseError } from "../../errors.js";
import { parseSource } from "../../parser/index.js";
import { groupClauses, groupKey } from "../clause-grouper.js";

function group(source: string) {
  return groupClauses("shapes", parseSource(source).functions);
}

describe("groupClauses", () => {
  it("should group clauses by name and arity in declaration order", () => {
    const { groups, errors } = group(
      [
        "area({square, S}) -> S * S;",
        "area({circle, R}) -> 3.14 * R * R.",
        "perimeter({square, S}) -> 4 * S.",
      ].join("\n")
    );

    expect(errors).toEqual([]);
    expect(groups.map((g) => `${g.name}/${g.arity}`)).toEqual(["area/1", "perimeter/1"]);
    expect(groups[0]?.clauses).toHaveLength(2);
    expect(groups[0]?.module).toBe("shapes");
  });

  it("should keep functions with the same name and different arity apart", () => {
    const { groups } = group("size(L) -> size(L, 0).\nsize([], N) -> N;\nsize([_ | T], N) -> size(T, N + 1).");

    expect(groups.map((g) => groupKey(g.name, g.arity))).toEqual(["size/1", "size/2"]);
    expect(groups[1]?.clauses).toHaveLength(2);
  });

  it("should report a split function and leave it out", () => {
    const { groups, errors } = group(
      ["f(1) -> one.", "g() -> ok.", "f(2) -> two."].join("\n")
    );

    expect(groups.map((g) => g.name)).toEqual(["g"]);
    expect(errors).toHaveLength(1);

    const [error] = errors;
    expect(error).toBeInstanceOf(NonContiguousClauseError);
    expect(error?.code).toBe(ErrorCode.GROUP_NON_CONTIGUOUS);
    expect(error?.message).toBe("Clauses of shapes:f/1 are not contiguous");
    expect(error?.context).toMatchObject({ functionName: "f", arity: 1, lines: [1, 3] });
  });

  it("should return nothing for a module without functions", () => {
    expect(group("-module(shapes).")).toEqual({ groups: [], errors: [] });
  });
});
