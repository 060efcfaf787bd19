/**
 * How an incoming value is reconciled with a stored one for the same record.
 */
export type MergeRule = "keep" | "fillIfBlank" | "overwrite";

export type MergePolicy<T> = { readonly [K in keyof T]?: MergeRule };

const policyFields = <T>(policy: MergePolicy<T>) =>
  Object.keys(policy).filter(
    (key): key is Extract<keyof T, string> => key in policy,
  );

const isBlank = (value: unknown): boolean =>
  value === null ||
  value === undefined ||
  (typeof value === "string" && value.trim().length === 0);

/**
 * Computes the field changes `incoming` makes to `existing` under `policy`. Fields the
 * policy does not name are kept. Returns an empty object when nothing changes.
 */
export const mergeChanges = <T extends object>(
  existing: T,
  incoming: Partial<T>,
  policy: MergePolicy<T>,
): Partial<T> => {
  const changes: Partial<T> = {};

  for (const field of policyFields(policy)) {
    const rule = policy[field];
    const next = incoming[field];
    if (rule === undefined || rule === "keep" || isBlank(next)) {
      continue;
    }

    const current = existing[field];
    if (rule === "fillIfBlank" && !isBlank(current)) {
      continue;
    }

    if (current !== next) {
      changes[field] = next;
    }
  }

  return changes;
};
