import {
  PersistenceGateway,
  TableGateway,
  TableFields,
  TableName,
  Stored,
  RowFilter,
  ScanOptions,
  UNIQUE_COLUMNS,
} from './gateway';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * In-process gateway used by the test suite and by `DATA_STORE=memory`.
 *
 * Every method finishes its read-check-write without awaiting, so on the single
 * Node.js event loop each call is atomic with respect to every other call.
 * Rows are cloned on the way in and out; callers never share references with
 * the store.
 */
class MemoryTable<F extends object> implements TableGateway<F> {
  private readonly rows = new Map<number, Stored<F>>();
  private nextId = 1;

  constructor(
    private readonly name: TableName,
    private readonly uniqueColumns: readonly string[]
  ) {}

  async insert(fields: F): Promise<Stored<F>> {
    const row: Stored<F> = { ...structuredClone(fields), id: this.nextId };
    this.assertUnique(row);
    this.nextId += 1;
    this.rows.set(row.id, row);
    return structuredClone(row);
  }

  async get(id: number): Promise<Stored<F> | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async scan(filter: RowFilter<F> = {}, options: ScanOptions<F> = {}): Promise<Stored<F>[]> {
    const matched = [...this.rows.values()].filter((row) => matches(row, filter));
    const orderBy = options.orderBy ?? [{ column: 'id' }];

    matched.sort((a, b) => {
      for (const { column, ascending = true } of orderBy) {
        const result = compareValues(Reflect.get(a, column), Reflect.get(b, column));
        if (result !== 0) return ascending ? result : -result;
      }
      return 0;
    });

    const limited = options.limit === undefined ? matched : matched.slice(0, options.limit);
    return limited.map((row) => structuredClone(row));
  }

  async updateIf(
    id: number,
    expected: RowFilter<F>,
    fields: Partial<F>
  ): Promise<Stored<F> | null> {
    const current = this.rows.get(id);
    if (!current || !matches(current, expected)) return null;

    const updated: Stored<F> = { ...current, ...structuredClone(fields), id };
    this.assertUnique(updated);
    this.rows.set(id, updated);
    return structuredClone(updated);
  }

  async delete(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }

  async deleteWhere(filter: RowFilter<F>): Promise<number> {
    let count = 0;
    for (const row of [...this.rows.values()]) {
      if (matches(row, filter)) {
        this.rows.delete(row.id);
        count += 1;
      }
    }
    return count;
  }

  private assertUnique(row: Stored<F>): void {
    for (const column of this.uniqueColumns) {
      const value: unknown = Reflect.get(row, column);
      if (value === null || value === undefined) continue;

      for (const other of this.rows.values()) {
        if (other.id !== row.id && Reflect.get(other, column) === value) {
          throw new AppError(
            ErrorCode.CONSTRAINT_VIOLATION,
            `Duplicate value for ${this.name}.${column}`,
            409,
            { table: this.name, column }
          );
        }
      }
    }
  }
}

function matches<F extends object>(row: Stored<F>, filter: RowFilter<F>): boolean {
  return Object.entries(filter).every(
    ([column, value]) => value === undefined || Reflect.get(row, column) === value
  );
}

// Binary ordering with NULLs last, as PostgreSQL sorts ascending
function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return String(a) < String(b) ? -1 : 1;
}

export class MemoryGateway implements PersistenceGateway {
  private readonly tables: { [T in TableName]: MemoryTable<TableFields[T]> } = {
    items: new MemoryTable('items', UNIQUE_COLUMNS.items),
    checkout_history: new MemoryTable('checkout_history', UNIQUE_COLUMNS.checkout_history),
    users: new MemoryTable('users', UNIQUE_COLUMNS.users),
    item_requests: new MemoryTable('item_requests', UNIQUE_COLUMNS.item_requests),
    categories: new MemoryTable('categories', UNIQUE_COLUMNS.categories),
    locations: new MemoryTable('locations', UNIQUE_COLUMNS.locations),
  };

  table<T extends TableName>(name: T): TableGateway<TableFields[T]> {
    return this.tables[name];
  }

  async ping(): Promise<void> {
    return;
  }
}
