/**
 * Columns every stored entity carries. `deletedAt` marks a logical delete.
 */
export type PersistedEntity = {
  id: string;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
};

export type AuditFields = Pick<PersistedEntity, "id" | "createdAt" | "updatedAt">;
