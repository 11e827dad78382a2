import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryGateway } from '../src/persistence/memory.gateway';
import { TableGateway } from '../src/persistence/gateway';
import { CatalogFields } from '../src/types/catalog.types';
import { ItemFields } from '../src/types/item.types';
import { ErrorCode } from '../src/types/error.types';

const itemFields = (name: string, overrides: Partial<ItemFields> = {}): ItemFields => ({
  name,
  description: null,
  category: null,
  barcode: null,
  serial_number: null,
  storage_location: null,
  is_checked_out: false,
  checked_out_by: null,
  checked_out_date: null,
  image_url: null,
  notes: null,
  created_date: '2026-01-01T00:00:00.000Z',
  last_modified_date: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

describe('MemoryGateway', () => {
  let items: TableGateway<ItemFields>;
  let categories: TableGateway<CatalogFields>;

  beforeEach(() => {
    const gateway = new MemoryGateway();
    items = gateway.table('items');
    categories = gateway.table('categories');
  });

  it('assigns increasing ids per table', async () => {
    const first = await items.insert(itemFields('Axe'));
    const second = await items.insert(itemFields('Map'));
    const category = await categories.insert({ name: 'Tools', created_by_id: 1, created_date: '2026-01-01' });

    expect([first.id, second.id, category.id]).toEqual([1, 2, 1]);
  });

  it('hands out copies of stored rows', async () => {
    const inserted = await items.insert(itemFields('Axe'));
    inserted.name = 'Changed';

    expect((await items.get(inserted.id))?.name).toBe('Axe');
  });

  it('updates only while the row still matches the expected values', async () => {
    const row = await items.insert(itemFields('Axe'));

    const first = await items.updateIf(row.id, { is_checked_out: false }, { is_checked_out: true });
    const second = await items.updateIf(row.id, { is_checked_out: false }, { is_checked_out: true });

    expect(first?.is_checked_out).toBe(true);
    expect(second).toBeNull();
    expect(await items.updateIf(99, {}, { name: 'Missing' })).toBeNull();
  });

  it('matches null filter values against NULL columns', async () => {
    await items.insert(itemFields('Axe'));
    await items.insert(itemFields('Map', { category: 'Navigation' }));

    const uncategorized = await items.scan({ category: null });

    expect(uncategorized.map((row) => row.name)).toEqual(['Axe']);
  });

  it('orders by several columns with NULLs last', async () => {
    await items.insert(itemFields('Map', { category: 'Navigation' }));
    await items.insert(itemFields('Axe'));
    await items.insert(itemFields('Compass', { category: 'Navigation' }));
    await items.insert(itemFields('Saw', { category: 'Tools' }));

    const rows = await items.scan({}, { orderBy: [{ column: 'category' }, { column: 'name', ascending: false }] });

    expect(rows.map((row) => row.name)).toEqual(['Map', 'Compass', 'Saw', 'Axe']);
  });

  it('limits scan results', async () => {
    await items.insert(itemFields('Axe'));
    await items.insert(itemFields('Map'));

    expect(await items.scan({}, { limit: 1 })).toHaveLength(1);
  });

  it('enforces unique columns on insert and update', async () => {
    await items.insert(itemFields('Axe', { barcode: 'B-1' }));
    const other = await items.insert(itemFields('Map', { barcode: 'B-2' }));

    await expect(items.insert(itemFields('Saw', { barcode: 'B-1' }))).rejects.toMatchObject({
      code: ErrorCode.CONSTRAINT_VIOLATION,
      details: { table: 'items', column: 'barcode' },
    });
    await expect(items.updateIf(other.id, {}, { barcode: 'B-1' })).rejects.toMatchObject({
      code: ErrorCode.CONSTRAINT_VIOLATION,
    });
    expect((await items.get(other.id))?.barcode).toBe('B-2');
  });

  it('deletes single rows and filtered sets', async () => {
    const axe = await items.insert(itemFields('Axe', { category: 'Tools' }));
    await items.insert(itemFields('Saw', { category: 'Tools' }));
    await items.insert(itemFields('Map'));

    expect(await items.delete(axe.id)).toBe(true);
    expect(await items.delete(axe.id)).toBe(false);
    expect(await items.deleteWhere({ category: 'Tools' })).toBe(1);
    expect((await items.scan()).map((row) => row.name)).toEqual(['Map']);
  });
});
