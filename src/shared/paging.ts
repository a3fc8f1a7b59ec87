/**
 * Cursor Paging
 * =============
 * Relay-style connections over offset cursors. A cursor is the base64 form of
 * the item's zero-based index in the filtered, ordered list.
 */

import { z } from "zod";

import { ValidationError } from "./errors.js";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 50;

export const pagingArgsSchema = z.object({
  first: z.number().int().nullish(),
  after: z.string().nullish(),
  last: z.number().int().nullish(),
  before: z.string().nullish(),
});

export type PagingArgs = z.infer<typeof pagingArgsSchema>;

export type PageWindow = {
  offset: number;
  limit: number;
};

export type Edge<T> = {
  cursor: string;
  node: T;
};

export type PageInfo = {
  hasNextPage: boolean;
  hasPreviousPage: boolean;
  startCursor: string | null;
  endCursor: string | null;
};

export type Connection<T> = {
  edges: Edge<T>[];
  nodes: T[];
  pageInfo: PageInfo;
  totalCount: number;
};

export function encodeCursor(index: number): string {
  return Buffer.from(String(index), "utf8").toString("base64");
}

export function decodeCursor(cursor: string): number | null {
  const raw = Buffer.from(cursor, "base64").toString("utf8");
  if (!/^\d+$/.test(raw)) {return null;}
  const index = Number(raw);
  return Number.isSafeInteger(index) ? index : null;
}

function checkSize(field: "first" | "last", value: number | null | undefined, errors: Record<string, string[]>) {
  if (value === null || value === undefined) {return;}
  if (value < 0) {
    errors[field] = [`${field} must not be negative`];
  } else if (value > MAX_PAGE_SIZE) {
    errors[field] = [`${field} must not exceed ${MAX_PAGE_SIZE}`];
  }
}

/**
 * Turns paging arguments into an offset/limit window over `totalCount` items.
 * Throws `ValidationError` for negative or oversized page sizes and for
 * cursors that do not decode.
 */
export function resolvePageWindow(args: PagingArgs, totalCount: number): PageWindow {
  const errors: Record<string, string[]> = {};
  checkSize("first", args.first, errors);
  checkSize("last", args.last, errors);

  const after = args.after ? decodeCursor(args.after) : null;
  if (args.after && after === null) {errors.after = ["after is not a valid cursor"];}
  const before = args.before ? decodeCursor(args.before) : null;
  if (args.before && before === null) {errors.before = ["before is not a valid cursor"];}

  if (Object.keys(errors).length > 0) {throw new ValidationError(errors);}

  let start = 0;
  let end = totalCount;
  if (after !== null) {start = Math.min(end, after + 1);}
  if (before !== null) {end = Math.max(start, Math.min(end, before));}

  const first = args.first ?? null;
  const last = args.last ?? null;
  if (first !== null) {
    end = Math.min(end, start + first);
  }
  if (last !== null) {
    start = Math.max(start, end - last);
  }
  if (first === null && last === null) {
    end = Math.min(end, start + DEFAULT_PAGE_SIZE);
  }

  return { offset: start, limit: end - start };
}

export function toConnection<T>(items: readonly T[], window: PageWindow, totalCount: number): Connection<T> {
  const edges = items.map((node, i) => ({ cursor: encodeCursor(window.offset + i), node }));
  const first = edges[0];
  const last = edges[edges.length - 1];

  return {
    edges,
    nodes: edges.map((e) => e.node),
    pageInfo: {
      hasNextPage: window.offset + items.length < totalCount,
      hasPreviousPage: window.offset > 0,
      startCursor: first ? first.cursor : null,
      endCursor: last ? last.cursor : null,
    },
    totalCount,
  };
}

/**
 * Pages a list that is already in memory.
 */
export function connectionFromArray<T>(items: readonly T[], args: PagingArgs): Connection<T> {
  const window = resolvePageWindow(args, items.length);
  return toConnection(items.slice(window.offset, window.offset + window.limit), window, items.length);
}
