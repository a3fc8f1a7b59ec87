/**
 * Filtering & Sorting
 * ===================
 * Shared `where` / `order` argument handling. Each filter has a SQL form (for
 * repository queries) and an in-memory form (for cached lists) with the same
 * case-sensitive semantics.
 */

import { and, asc, desc, eq, type SQL, sql } from "drizzle-orm";
import type { AnySQLiteColumn } from "drizzle-orm/sqlite-core";
import { z } from "zod";

export const stringFilterSchema = z.object({
  eq: z.string().nullish(),
  contains: z.string().nullish(),
  startsWith: z.string().nullish(),
});

export type StringFilter = z.infer<typeof stringFilterSchema>;

export const idFilterSchema = z.object({
  eq: z.string().nullish(),
});

export type IdFilter = z.infer<typeof idFilterSchema>;

export const sortDirectionSchema = z.enum(["ASC", "DESC"]);
export type SortDirection = z.infer<typeof sortDirectionSchema>;

export type SortTerm<K extends string> = {
  field: K;
  direction: SortDirection;
};

export function stringCondition(column: AnySQLiteColumn, filter: StringFilter | null | undefined): SQL | undefined {
  if (!filter) {return undefined;}
  const parts: SQL[] = [];
  if (filter.eq !== null && filter.eq !== undefined) {
    parts.push(eq(column, filter.eq));
  }
  if (filter.contains !== null && filter.contains !== undefined) {
    parts.push(sql`instr(${column}, ${filter.contains}) > 0`);
  }
  if (filter.startsWith !== null && filter.startsWith !== undefined) {
    parts.push(sql`substr(${column}, 1, length(${filter.startsWith})) = ${filter.startsWith}`);
  }
  return and(...parts);
}

export function matchesString(value: string, filter: StringFilter | null | undefined): boolean {
  if (!filter) {return true;}
  if (filter.eq !== null && filter.eq !== undefined && value !== filter.eq) {return false;}
  if (filter.contains !== null && filter.contains !== undefined && !value.includes(filter.contains)) {
    return false;
  }
  if (filter.startsWith !== null && filter.startsWith !== undefined && !value.startsWith(filter.startsWith)) {
    return false;
  }
  return true;
}

/**
 * Flattens `[{ createdAt: DESC }, { content: ASC }]` into ordered sort terms.
 */
export function toSortTerms<K extends string>(
  order: ReadonlyArray<Partial<Record<K, SortDirection | null>>> | null | undefined,
  fields: readonly K[]
): SortTerm<K>[] {
  const terms: SortTerm<K>[] = [];
  for (const entry of order ?? []) {
    for (const key of Object.keys(entry)) {
      const field = fields.find((f) => f === key);
      const direction = field ? entry[field] : undefined;
      if (field && direction) {terms.push({ field, direction });}
    }
  }
  return terms;
}

export function toOrderBy<K extends string>(terms: SortTerm<K>[], columns: Record<K, AnySQLiteColumn>): SQL[] {
  return terms.map((t) => (t.direction === "ASC" ? asc(columns[t.field]) : desc(columns[t.field])));
}

type Comparable = string | number;

export function compareBy<T, K extends string>(
  terms: SortTerm<K>[],
  read: (item: T, field: K) => Comparable | null
): (a: T, b: T) => number {
  return (a, b) => {
    for (const t of terms) {
      const av = read(a, t.field);
      const bv = read(b, t.field);
      if (av === bv) {continue;}
      // Nulls first ascending, matching SQLite.
      let cmp: number;
      if (av === null) {cmp = -1;}
      else if (bv === null) {cmp = 1;}
      else if (typeof av === "string" && typeof bv === "string") {
        // UTF-8 byte order, as SQLite's BINARY collation compares text.
        cmp = Buffer.compare(Buffer.from(av, "utf8"), Buffer.from(bv, "utf8"));
      }
      else {cmp = av < bv ? -1 : 1;}
      if (cmp === 0) {continue;}
      return t.direction === "ASC" ? cmp : -cmp;
    }
    return 0;
  };
}
