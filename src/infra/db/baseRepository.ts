import { and, eq, isNull, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import type {
  AuditFields,
  PersistedEntity,
} from "../../core/entities/persistedEntity";
import type {
  FilterSpec,
  FindOptions,
} from "../../core/query/filterSpec";
import type {
  ClockPort,
  EntityRepositoryPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";
import type { AppDatabase } from "./client";
import {
  buildFilterWhere,
  buildOrderBy,
  type TableColumns,
} from "./filterQuery";
import { toStorageError } from "./storageErrors";

export type RowQuery = {
  where: SQL;
  orderBy?: SQL;
  limit?: number;
};

export type AuditChanges = {
  updatedAt: Date;
  deletedAt?: Date;
};

export type RepositoryTable = {
  name: string;
  columns: TableColumns;
  id: PgColumn;
  deletedAt: PgColumn;
};

/**
 * Generic CRUD over one soft-deletable table. Subclasses own the four statements that
 * need the concrete drizzle table type; everything else (filters, soft-delete rules,
 * audit stamping, error mapping) lives here.
 */
export abstract class SoftDeleteRepository<
  TEntity extends PersistedEntity,
  TNew extends object,
> implements EntityRepositoryPort<TEntity, TNew>
{
  private readonly updatableFields: ReadonlySet<string>;

  protected constructor(
    protected readonly db: AppDatabase,
    protected readonly table: RepositoryTable,
    updatableFields: ReadonlyArray<keyof TNew & string>,
    protected readonly clock: ClockPort,
    protected readonly ids: IdGeneratorPort,
  ) {
    this.updatableFields = new Set(updatableFields);
  }

  protected abstract selectRows(query: RowQuery): Promise<TEntity[]>;

  protected abstract insertRows(
    rows: Array<TNew & AuditFields>,
  ): Promise<TEntity[]>;

  protected abstract updateRows(
    where: SQL,
    changes: Partial<TNew>,
    audit: AuditChanges,
  ): Promise<TEntity[]>;

  protected abstract deleteRows(where: SQL): Promise<number>;

  protected abstract countRows(where: SQL): Promise<number>;

  async create(attributes: TNew): Promise<TEntity> {
    const [created] = await this.createMany([attributes]);
    if (!created) {
      throw toStorageError(
        new Error("insert returned no row"),
        `Creating ${this.table.name} row`,
      );
    }
    return created;
  }

  /**
   * One INSERT statement for the whole list, so the batch commits or fails as a unit.
   */
  async createMany(items: TNew[]): Promise<TEntity[]> {
    if (items.length === 0) {
      return [];
    }

    const now = this.clock.now();
    const rows = items.map((item) => ({
      ...item,
      id: this.ids.next(),
      createdAt: now,
      updatedAt: now,
    }));

    return this.run(`Creating ${this.table.name} rows`, () =>
      this.insertRows(rows),
    );
  }

  async findById(id: string): Promise<TEntity | null> {
    const [row] = await this.run(`Reading ${this.table.name} by id`, () =>
      this.selectRows({ where: this.activeById(id), limit: 1 }),
    );
    return row ?? null;
  }

  async findAll(options: FindOptions<TEntity> = {}): Promise<TEntity[]> {
    return this.findBy({}, options);
  }

  async findBy(
    filter: FilterSpec<TEntity>,
    options: FindOptions<TEntity> = {},
  ): Promise<TEntity[]> {
    return this.run(`Querying ${this.table.name}`, () =>
      this.selectRows({
        where: buildFilterWhere(this.table.columns, this.table.deletedAt, filter),
        orderBy: buildOrderBy(this.table.columns, options.orderBy),
        limit: options.limit,
      }),
    );
  }

  async findOneBy(
    filter: FilterSpec<TEntity>,
    options: Omit<FindOptions<TEntity>, "limit"> = {},
  ): Promise<TEntity | null> {
    const [row] = await this.findBy(filter, { ...options, limit: 1 });
    return row ?? null;
  }

  async count(filter: FilterSpec<TEntity> = {}): Promise<number> {
    return this.run(`Counting ${this.table.name}`, () =>
      this.countRows(
        buildFilterWhere(this.table.columns, this.table.deletedAt, filter),
      ),
    );
  }

  async exists(filter: FilterSpec<TEntity>): Promise<boolean> {
    return (await this.count(filter)) > 0;
  }

  /**
   * Applies only updatable keys; anything else in `attributes` is dropped. Returns the
   * row as stored after the update.
   */
  async update(
    id: string,
    attributes: Partial<TNew>,
  ): Promise<TEntity | null> {
    const changes = this.pickUpdatable(attributes);

    const [row] = await this.run(`Updating ${this.table.name} row`, () =>
      this.updateRows(this.activeById(id), changes, {
        updatedAt: this.clock.now(),
      }),
    );
    return row ?? null;
  }

  /**
   * Only touches rows that are not already deleted, so a repeated call reports false.
   */
  async softDelete(id: string): Promise<boolean> {
    const now = this.clock.now();
    const rows = await this.run(`Soft-deleting ${this.table.name} row`, () =>
      this.updateRows(
        this.activeById(id),
        {},
        { deletedAt: now, updatedAt: now },
      ),
    );
    return rows.length > 0;
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.run(`Deleting ${this.table.name} row`, () =>
      this.deleteRows(eq(this.table.id, id)),
    );
    return removed > 0;
  }

  protected activeById(id: string): SQL {
    return (
      and(eq(this.table.id, id), isNull(this.table.deletedAt)) ??
      eq(this.table.id, id)
    );
  }

  protected async run<T>(action: string, statement: () => Promise<T>): Promise<T> {
    try {
      return await statement();
    } catch (error) {
      throw toStorageError(error, action);
    }
  }

  private pickUpdatable(attributes: Partial<TNew>): Partial<TNew> {
    const picked: Partial<TNew> = {};
    for (const key of Object.keys(attributes)) {
      if (this.isUpdatableField(key)) {
        picked[key] = attributes[key];
      }
    }
    return picked;
  }

  private isUpdatableField(key: string): key is keyof TNew & string {
    return this.updatableFields.has(key);
  }
}
