import { PersistenceGateway, Stored, TableGateway } from '../persistence/gateway';
import { CatalogFields } from '../types/catalog.types';

export type CatalogRow = Stored<CatalogFields>;

/**
 * Catalog Repository
 *
 * Storage for one of the named lookup lists (categories or locations); both
 * tables share a shape.
 */
export class CatalogRepository {
  private entries: TableGateway<CatalogFields>;

  constructor(gateway: PersistenceGateway, table: 'categories' | 'locations') {
    this.entries = gateway.table(table);
  }

  async create(name: string, createdById: number): Promise<CatalogRow> {
    return this.entries.insert({
      name,
      created_by_id: createdById,
      created_date: new Date().toISOString(),
    });
  }

  async findByName(name: string): Promise<CatalogRow | null> {
    const [row] = await this.entries.scan({ name }, { limit: 1 });
    return row ?? null;
  }

  async findAll(): Promise<CatalogRow[]> {
    return this.entries.scan({}, { orderBy: [{ column: 'name' }] });
  }

  async rename(id: number, name: string): Promise<CatalogRow | null> {
    return this.entries.updateIf(id, {}, { name });
  }

  async delete(id: number): Promise<boolean> {
    return this.entries.delete(id);
  }
}
