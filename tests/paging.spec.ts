import { describe, expect, it } from "vitest";

import {
  connectionFromArray,
  decodeCursor,
  encodeCursor,
  resolvePageWindow,
} from "../src/shared/paging.js";
import { compareBy, matchesString, toSortTerms } from "../src/shared/query-filters.js";
import { ValidationError } from "../src/shared/errors.js";

function validationFields(fn: () => unknown): Record<string, string[]> | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {return error.fields;}
    throw error;
  }
  return undefined;
}

describe("cursors", () => {
  it("encodes the index as base64", () => {
    expect(encodeCursor(0)).toBe("MA==");
    expect(decodeCursor(encodeCursor(42))).toBe(42);
  });

  it("rejects cursors that are not encoded indexes", () => {
    expect(decodeCursor("not-a-cursor")).toBeNull();
    expect(decodeCursor(Buffer.from("-1").toString("base64"))).toBeNull();
  });
});

describe("resolvePageWindow", () => {
  it("defaults to the first ten items", () => {
    expect(resolvePageWindow({}, 25)).toEqual({ offset: 0, limit: 10 });
  });

  it("pages forward from a cursor", () => {
    expect(resolvePageWindow({ first: 5, after: encodeCursor(9) }, 25)).toEqual({ offset: 10, limit: 5 });
  });

  it("pages backward from the end or from a cursor", () => {
    expect(resolvePageWindow({ last: 5 }, 25)).toEqual({ offset: 20, limit: 5 });
    expect(resolvePageWindow({ last: 3, before: encodeCursor(10) }, 25)).toEqual({ offset: 7, limit: 3 });
  });

  it("clamps to the end of the list", () => {
    expect(resolvePageWindow({ first: 50 }, 25)).toEqual({ offset: 0, limit: 25 });
    expect(resolvePageWindow({ after: encodeCursor(30) }, 25)).toEqual({ offset: 25, limit: 0 });
  });

  it("rejects bad sizes and cursors together", () => {
    expect(validationFields(() => resolvePageWindow({ first: 51, last: -1, after: "%%%" }, 10))).toEqual({
      first: ["first must not exceed 50"],
      last: ["last must not be negative"],
      after: ["after is not a valid cursor"],
    });
  });
});

describe("connectionFromArray", () => {
  it("builds edges and page info", () => {
    const items = ["a", "b", "c", "d"];
    const page = connectionFromArray(items, { first: 2, after: encodeCursor(0) });

    expect(page).toEqual({
      edges: [
        { cursor: encodeCursor(1), node: "b" },
        { cursor: encodeCursor(2), node: "c" },
      ],
      nodes: ["b", "c"],
      pageInfo: {
        hasNextPage: true,
        hasPreviousPage: true,
        startCursor: encodeCursor(1),
        endCursor: encodeCursor(2),
      },
      totalCount: 4,
    });
  });

  it("returns null cursors for an empty page", () => {
    expect(connectionFromArray([], {}).pageInfo).toEqual({
      hasNextPage: false,
      hasPreviousPage: false,
      startCursor: null,
      endCursor: null,
    });
  });
});

describe("filters and sorting", () => {
  it("matches strings case-sensitively", () => {
    expect(matchesString("Hello world", { contains: "world", startsWith: "Hello" })).toBe(true);
    expect(matchesString("Hello world", { contains: "World" })).toBe(false);
    expect(matchesString("Hello", { eq: "Hello" })).toBe(true);
    expect(matchesString("Hello", null)).toBe(true);
  });

  it("keeps sort terms in input order and ignores unknown keys", () => {
    const terms = toSortTerms([{ content: "ASC", createdAt: null }, { createdAt: "DESC" }], ["content", "createdAt"]);
    expect(terms).toEqual([
      { field: "content", direction: "ASC" },
      { field: "createdAt", direction: "DESC" },
    ]);
  });

  it("sorts by several terms with nulls first ascending", () => {
    type Row = { name: string; rank: number | null };
    const rows: Row[] = [
      { name: "b", rank: 2 },
      { name: "a", rank: null },
      { name: "a", rank: 1 },
    ];
    const compare = compareBy<Row, "name" | "rank">(
      [
        { field: "name", direction: "ASC" },
        { field: "rank", direction: "DESC" },
      ],
      (row, field) => row[field]
    );

    expect([...rows].sort(compare)).toEqual([
      { name: "a", rank: 1 },
      { name: "a", rank: null },
      { name: "b", rank: 2 },
    ]);
  });

  it("orders strings by their UTF-8 bytes like SQLite", () => {
    const compare = compareBy<string, "value">([{ field: "value", direction: "ASC" }], (s) => s);
    // U+FF01 encodes as EF BC 81 and sorts before U+1F600 (F0 9F 98 80),
    // although its UTF-16 code unit is the larger one.
    expect(["\u{1F600}", "\uFF01", "a"].sort(compare)).toEqual(["a", "\uFF01", "\u{1F600}"]);
  });
});
