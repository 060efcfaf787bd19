export type ComparisonOperator = "gt" | "gte" | "lt" | "lte";

export type FilterCondition<V> =
  | { readonly op: "eq"; readonly value: V }
  | { readonly op: "in"; readonly values: readonly V[] }
  | { readonly op: "notIn"; readonly values: readonly V[] }
  | { readonly op: "isNull" }
  | { readonly op: "isNotNull" }
  | { readonly op: ComparisonOperator; readonly value: V }
  | { readonly op: "between"; readonly from: V; readonly to: V };

/**
 * A bare value means equality; `null` means IS NULL.
 */
export type FieldFilter<V> = V | FilterCondition<NonNullable<V>>;

/**
 * Field-to-condition mapping over one entity. Every condition is ANDed together with
 * the soft-delete exclusion.
 */
export type FilterSpec<TEntity> = {
  readonly [K in keyof TEntity]?: FieldFilter<TEntity[K]>;
};

export type SortDirection = "asc" | "desc";

export type OrderSpec<TEntity> = {
  field: keyof TEntity & string;
  direction?: SortDirection;
};

export type FindOptions<TEntity> = {
  orderBy?: OrderSpec<TEntity>;
  limit?: number;
};

const filterOperators: ReadonlySet<string> = new Set([
  "eq",
  "in",
  "notIn",
  "isNull",
  "isNotNull",
  "gt",
  "gte",
  "lt",
  "lte",
  "between",
]);

export const isFilterCondition = (
  value: unknown,
): value is FilterCondition<unknown> =>
  typeof value === "object" &&
  value !== null &&
  !(value instanceof Date) &&
  "op" in value &&
  typeof value.op === "string" &&
  filterOperators.has(value.op);

/**
 * Condition builders, e.g. `{ stockId: id, tradingDate: where.between(start, end) }`.
 */
export const where = {
  eq: <V>(value: V): FilterCondition<V> => ({ op: "eq", value }),
  in: <V>(values: readonly V[]): FilterCondition<V> => ({ op: "in", values }),
  notIn: <V>(values: readonly V[]): FilterCondition<V> => ({
    op: "notIn",
    values,
  }),
  isNull: <V = never>(): FilterCondition<V> => ({ op: "isNull" }),
  isNotNull: <V = never>(): FilterCondition<V> => ({ op: "isNotNull" }),
  gt: <V>(value: V): FilterCondition<V> => ({ op: "gt", value }),
  gte: <V>(value: V): FilterCondition<V> => ({ op: "gte", value }),
  lt: <V>(value: V): FilterCondition<V> => ({ op: "lt", value }),
  lte: <V>(value: V): FilterCondition<V> => ({ op: "lte", value }),
  between: <V>(from: V, to: V): FilterCondition<V> => ({
    op: "between",
    from,
    to,
  }),
};
