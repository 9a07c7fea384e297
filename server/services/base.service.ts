import type { Knex } from 'knex';
import { getDb } from '../database/connection';
import { toAppError } from '../lib/errors';
import { parseCount } from '../lib/format';
import type { SequenceName } from '../../shared/constants';

export interface ListOptions {
  page?: number;
  limit?: number;
  search?: string;
  searchFields?: string[];
  sortBy?: string;
  sortOrder?: 'asc' | 'desc';
  filters?: Record<string, string | number | undefined>;
}

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

/**
 * Connection access plus the transaction boundary every ledger
 * operation runs through. Failures that are not domain errors
 * leave here as StorageError.
 */
export class ServiceBase {
  protected get db(): Knex {
    return getDb();
  }

  /**
   * Run `work` atomically. With an outer transaction it joins it,
   * otherwise it opens (and commits or rolls back) its own.
   */
  protected async inTransaction<T>(
    operation: string,
    work: (trx: Knex.Transaction) => Promise<T>,
    trx?: Knex.Transaction
  ): Promise<T> {
    try {
      if (trx) {
        return await work(trx);
      }
      return await this.db.transaction(async (newTrx) => work(newTrx));
    } catch (error) {
      throw toAppError(operation, error);
    }
  }

  protected async read<T>(operation: string, work: (db: Knex) => Promise<T>): Promise<T> {
    try {
      return await work(this.db);
    } catch (error) {
      throw toAppError(operation, error);
    }
  }

  /** Next value of a document_sequences counter, under a row lock. */
  protected async nextSequence(trx: Knex.Transaction, name: SequenceName): Promise<number> {
    const row = await trx('document_sequences').where({ name }).forUpdate().first();
    if (!row) throw new Error(`Sequence ${name} is not configured`);

    const next = parseCount(row.last_value) + 1;
    await trx('document_sequences').where({ name }).update({ last_value: next });
    return next;
  }
}

export abstract class BaseService<TRow, TEntity> extends ServiceBase {
  protected readonly tableName: string;

  constructor(tableName: string) {
    super();
    this.tableName = tableName;
  }

  protected abstract toEntity(row: TRow): TEntity;

  async getById(id: number, db: Knex = this.db): Promise<TEntity | null> {
    const row: TRow | undefined = await db(this.tableName).where({ id }).first();
    return row ? this.toEntity(row) : null;
  }

  async list(options: ListOptions = {}): Promise<PaginatedResult<TEntity>> {
    const {
      page = 1,
      limit = 50,
      search,
      searchFields = ['name'],
      sortBy = 'id',
      sortOrder = 'desc',
      filters = {},
    } = options;

    const offset = (page - 1) * limit;

    return this.read(`list ${this.tableName}`, async (db) => {
      let query = db(this.tableName);

      for (const [key, value] of Object.entries(filters)) {
        if (value !== undefined && value !== '') {
          query = query.where(key, value);
        }
      }

      if (search && searchFields.length > 0) {
        query = query.where(function () {
          for (const field of searchFields) {
            this.orWhereILike(field, `%${search}%`);
          }
        });
      }

      const countResult = await query.clone().count({ total: '*' }).first();
      const total = parseCount(countResult?.total);

      const rows: TRow[] = await query
        .select('*')
        .orderBy(sortBy, sortOrder)
        .orderBy('id', sortOrder)
        .limit(limit)
        .offset(offset);

      return {
        data: rows.map((row) => this.toEntity(row)),
        total,
        page,
        limit,
        totalPages: Math.ceil(total / limit),
      };
    });
  }

  protected async insertRow(trx: Knex.Transaction, data: Record<string, unknown>): Promise<TEntity> {
    const [row]: TRow[] = await trx(this.tableName).insert(data).returning('*');
    return this.toEntity(row);
  }
}
