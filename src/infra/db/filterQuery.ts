import {
  and,
  asc,
  between,
  desc,
  eq,
  gt,
  gte,
  inArray,
  isNotNull,
  isNull,
  lt,
  lte,
  notInArray,
  sql,
  type SQL,
} from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import {
  isFilterCondition,
  type FilterSpec,
  type OrderSpec,
} from "../../core/query/filterSpec";

export type TableColumns = Readonly<Record<string, PgColumn>>;

const columnFor = (
  columns: TableColumns,
  field: string,
): PgColumn | undefined =>
  Object.hasOwn(columns, field) ? columns[field] : undefined;

const toCondition = (column: PgColumn, filter: unknown): SQL | undefined => {
  if (filter === undefined) {
    return undefined;
  }

  if (filter === null) {
    return isNull(column);
  }

  if (!isFilterCondition(filter)) {
    return eq(column, filter);
  }

  switch (filter.op) {
    case "eq":
      return filter.value === null ? isNull(column) : eq(column, filter.value);
    case "in":
      return filter.values.length === 0
        ? sql`false`
        : inArray(column, [...filter.values]);
    case "notIn":
      return filter.values.length === 0
        ? undefined
        : notInArray(column, [...filter.values]);
    case "isNull":
      return isNull(column);
    case "isNotNull":
      return isNotNull(column);
    case "gt":
      return gt(column, filter.value);
    case "gte":
      return gte(column, filter.value);
    case "lt":
      return lt(column, filter.value);
    case "lte":
      return lte(column, filter.value);
    case "between":
      return between(column, filter.from, filter.to);
  }
};

/**
 * Translates a filter spec into one WHERE clause. The soft-delete exclusion is always
 * part of it. Keys that are not columns of the table, and undefined conditions, are
 * skipped so optional filters can be passed through unchanged.
 */
export const buildFilterWhere = <TEntity>(
  columns: TableColumns,
  deletedAt: PgColumn,
  spec: FilterSpec<TEntity>,
): SQL => {
  const conditions: SQL[] = [isNull(deletedAt)];

  for (const [field, filter] of Object.entries(spec)) {
    const column = columnFor(columns, field);
    if (!column) {
      continue;
    }

    const condition = toCondition(column, filter);
    if (condition) {
      conditions.push(condition);
    }
  }

  return and(...conditions) ?? isNull(deletedAt);
};

/**
 * Resolves an order spec to a sort expression; unknown fields leave the query unordered.
 */
export const buildOrderBy = <TEntity>(
  columns: TableColumns,
  order: OrderSpec<TEntity> | undefined,
): SQL | undefined => {
  if (!order) {
    return undefined;
  }

  const column = columnFor(columns, order.field);
  if (!column) {
    return undefined;
  }

  return order.direction === "desc" ? desc(column) : asc(column);
};
