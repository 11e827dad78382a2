import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import {
  PersistenceGateway,
  TableGateway,
  TableFields,
  TableName,
  Stored,
  RowFilter,
  ScanOptions,
} from './gateway';
import { AppError, ErrorCode, Errors } from '../types/error.types';
import { logger } from '../config/logger';

const NO_ROWS = 'PGRST116';
const UNIQUE_VIOLATION = '23505';

/**
 * Supabase (PostgREST) implementation of the persistence gateway
 *
 * Conditional updates become a single `UPDATE ... WHERE id = ? AND <expected>`
 * statement, so PostgreSQL serializes concurrent writers on the row lock and the
 * loser matches zero rows. Every request is bounded by an abort timeout; a
 * timeout or transport failure surfaces as UNAVAILABLE.
 */
class SupabaseTable<F> implements TableGateway<F> {
  constructor(
    private client: SupabaseClient,
    private name: TableName,
    private timeoutMs: number
  ) {}

  async insert(fields: F): Promise<Stored<F>> {
    const { data, error } = await this.execute(
      'insert',
      this.client.from(this.name).insert(fields).select().abortSignal(this.signal()).single()
    );

    if (error) throw this.fail('insert', error);
    return data;
  }

  async get(id: number): Promise<Stored<F> | null> {
    const { data, error } = await this.execute(
      'get',
      this.client.from(this.name).select('*').eq('id', id).abortSignal(this.signal()).single()
    );

    if (error) {
      if (error.code === NO_ROWS) return null; // Not found
      throw this.fail('get', error);
    }

    return data;
  }

  async scan(filter: RowFilter<F> = {}, options: ScanOptions<F> = {}): Promise<Stored<F>[]> {
    let query = this.client.from(this.name).select('*');

    for (const [column, value] of Object.entries(filter)) {
      if (value === undefined) continue;
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }

    for (const { column, ascending = true } of options.orderBy ?? [{ column: 'id' }]) {
      query = query.order(column, { ascending });
    }

    if (options.limit !== undefined) {
      query = query.limit(options.limit);
    }

    const { data, error } = await this.execute('scan', query.abortSignal(this.signal()));

    if (error) throw this.fail('scan', error);
    return data ?? [];
  }

  async updateIf(
    id: number,
    expected: RowFilter<F>,
    fields: Partial<F>
  ): Promise<Stored<F> | null> {
    let query = this.client.from(this.name).update(fields).eq('id', id);

    for (const [column, value] of Object.entries(expected)) {
      if (value === undefined) continue;
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }

    const { data, error } = await this.execute(
      'updateIf',
      query.select().abortSignal(this.signal()).single()
    );

    if (error) {
      if (error.code === NO_ROWS) {
        // No rows updated - row missing or no longer in the expected state
        logger.debug('Conditional update matched no rows', { table: this.name, id });
        return null;
      }
      throw this.fail('updateIf', error);
    }

    return data;
  }

  async delete(id: number): Promise<boolean> {
    const { error, count } = await this.execute(
      'delete',
      this.client
        .from(this.name)
        .delete({ count: 'exact' })
        .eq('id', id)
        .abortSignal(this.signal())
    );

    if (error) throw this.fail('delete', error);
    return (count ?? 0) > 0;
  }

  async deleteWhere(filter: RowFilter<F>): Promise<number> {
    const entries = Object.entries(filter).filter(([, value]) => value !== undefined);
    if (entries.length === 0) {
      throw new Error(`Refusing unfiltered delete on ${this.name}`);
    }

    let query = this.client.from(this.name).delete({ count: 'exact' });
    for (const [column, value] of entries) {
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }

    const { error, count } = await this.execute('deleteWhere', query.abortSignal(this.signal()));

    if (error) throw this.fail('deleteWhere', error);
    return count ?? 0;
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.timeoutMs);
  }

  private async execute<R>(operation: string, query: PromiseLike<R>): Promise<R> {
    try {
      return await query;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Storage request failed', { table: this.name, operation, error: message });
      throw Errors.unavailable(`${this.name}.${operation}`, message);
    }
  }

  private fail(operation: string, error: PostgrestError): AppError {
    if (error.code === UNIQUE_VIOLATION) {
      return new AppError(
        ErrorCode.CONSTRAINT_VIOLATION,
        `Duplicate value in ${this.name}`,
        409,
        { table: this.name, detail: error.details }
      );
    }

    logger.error('Storage operation failed', {
      table: this.name,
      operation,
      error: error.message,
      code: error.code,
      details: error.details,
      hint: error.hint,
    });
    return Errors.unavailable(`${this.name}.${operation}`, error.message);
  }
}

export class SupabaseGateway implements PersistenceGateway {
  constructor(
    private client: SupabaseClient,
    private timeoutMs: number
  ) {}

  table<T extends TableName>(name: T): TableGateway<TableFields[T]> {
    return new SupabaseTable<TableFields[T]>(this.client, name, this.timeoutMs);
  }

  async ping(): Promise<void> {
    const { error } = await this.client
      .from('items')
      .select('id')
      .limit(1)
      .abortSignal(AbortSignal.timeout(this.timeoutMs));

    if (error) {
      logger.error('Database connection failed', { error: error.message });
      throw Errors.unavailable('ping', error.message);
    }
  }
}
