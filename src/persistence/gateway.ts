import { ItemFields, HistoryFields } from '../types/item.types';
import { UserFields } from '../types/user.types';
import { ItemRequestFields } from '../types/request.types';
import { CatalogFields } from '../types/catalog.types';

/**
 * Persistence Gateway
 *
 * Storage contract the repositories are written against. Every record is keyed
 * by a positive integer id assigned by the store. `updateIf` is the only way a
 * repository changes a row's state: it writes only when the row still matches
 * the expected values, in one atomic step.
 */

export interface TableFields {
  items: ItemFields;
  checkout_history: HistoryFields;
  users: UserFields;
  item_requests: ItemRequestFields;
  categories: CatalogFields;
  locations: CatalogFields;
}

export type TableName = keyof TableFields;

export type Stored<F> = F & { id: number };

// Equality match on every provided column; null matches a NULL column
export type RowFilter<F> = Partial<F> & { id?: number };

export interface OrderBy<F> {
  column: (keyof F & string) | 'id';
  ascending?: boolean;
}

export interface ScanOptions<F> {
  orderBy?: OrderBy<F>[];
  limit?: number;
}

export interface TableGateway<F> {
  insert(fields: F): Promise<Stored<F>>;
  get(id: number): Promise<Stored<F> | null>;
  scan(filter?: RowFilter<F>, options?: ScanOptions<F>): Promise<Stored<F>[]>;
  /**
   * Returns the updated row, or null when no row with this id matched `expected`.
   */
  updateIf(id: number, expected: RowFilter<F>, fields: Partial<F>): Promise<Stored<F> | null>;
  delete(id: number): Promise<boolean>;
  deleteWhere(filter: RowFilter<F>): Promise<number>;
}

export interface PersistenceGateway {
  table<T extends TableName>(name: T): TableGateway<TableFields[T]>;
  ping(): Promise<void>;
}

// Unique columns the schema enforces
export const UNIQUE_COLUMNS: { [T in TableName]: (keyof TableFields[T] & string)[] } = {
  items: ['barcode'],
  checkout_history: [],
  users: ['username'],
  item_requests: [],
  categories: ['name'],
  locations: ['name'],
};
