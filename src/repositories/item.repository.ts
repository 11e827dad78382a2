import { PersistenceGateway, Stored, TableGateway } from '../persistence/gateway';
import {
  HistoryAction,
  HistoryEntry,
  HistoryFields,
  Item,
  ItemDetails,
  ItemFields,
} from '../types/item.types';
import { AppError, ErrorCode } from '../types/error.types';
import { moduleLogger } from '../config/logger';
import { parseStoredEnum } from '../utils/enum-parser';

const logger = moduleLogger('item-repository');

/**
 * Item Repository
 *
 * Handles all storage operations for the items and checkout_history tables.
 * Custody transitions are conditional writes gated on the current checkout
 * state, paired with the history append they must commit together with.
 */
export class ItemRepository {
  private items: TableGateway<ItemFields>;
  private history: TableGateway<HistoryFields>;

  constructor(gateway: PersistenceGateway) {
    this.items = gateway.table('items');
    this.history = gateway.table('checkout_history');
  }

  /**
   * Create a new item in the available state
   */
  async create(details: ItemDetails): Promise<Item> {
    logger.debug('Creating item', { name: details.name });

    const now = new Date().toISOString();
    const row = await this.items.insert({
      name: details.name,
      description: details.description,
      category: details.category,
      barcode: details.barcode,
      serial_number: details.serialNumber,
      storage_location: details.storageLocation,
      image_url: details.imageUrl,
      notes: details.notes,
      is_checked_out: false,
      checked_out_by: null,
      checked_out_date: null,
      created_date: now,
      last_modified_date: now,
    });

    return this.mapToItem(row);
  }

  /**
   * Find item by ID
   */
  async findById(id: number): Promise<Item | null> {
    const row = await this.items.get(id);
    return row ? this.mapToItem(row) : null;
  }

  async findByBarcode(barcode: string): Promise<Item | null> {
    const [row] = await this.items.scan({ barcode }, { limit: 1 });
    return row ? this.mapToItem(row) : null;
  }

  /**
   * All items, ordered by name
   */
  async findAll(): Promise<Item[]> {
    const rows = await this.items.scan({}, { orderBy: [{ column: 'name' }, { column: 'id' }] });
    return rows.map((row) => this.mapToItem(row));
  }

  /**
   * Merge descriptive fields over the stored record. Checkout columns are
   * never part of this write.
   */
  async updateDetails(id: number, details: Partial<ItemDetails>): Promise<Item | null> {
    const row = await this.items.updateIf(
      id,
      {},
      { ...this.toColumns(details), last_modified_date: new Date().toISOString() }
    );

    return row ? this.mapToItem(row) : null;
  }

  /**
   * Check an item out (atomic)
   *
   * The UPDATE only matches while is_checked_out is false, so of two concurrent
   * checkouts exactly one sees a row come back. Returns null when the item is
   * missing or already checked out.
   */
  async checkoutAtomic(id: number, personName: string, notes: string | null): Promise<Item | null> {
    const now = new Date().toISOString();

    const row = await this.items.updateIf(
      id,
      { is_checked_out: false },
      {
        is_checked_out: true,
        checked_out_by: personName,
        checked_out_date: now,
        last_modified_date: now,
      }
    );

    if (!row) {
      logger.debug('Checkout not applied - item missing or unavailable', { id });
      return null;
    }

    await this.appendHistoryOrRevert(row, HistoryAction.CHECKOUT, personName, notes, now);
    return this.mapToItem(row);
  }

  /**
   * Check an item in (atomic)
   *
   * The UPDATE only matches while is_checked_out is true. Returns null when the
   * item is missing or not checked out.
   */
  async checkinAtomic(id: number, personName: string, notes: string | null): Promise<Item | null> {
    const now = new Date().toISOString();

    const row = await this.items.updateIf(
      id,
      { is_checked_out: true },
      {
        is_checked_out: false,
        checked_out_by: null,
        checked_out_date: null,
        last_modified_date: now,
      }
    );

    if (!row) {
      logger.debug('Checkin not applied - item missing or not checked out', { id });
      return null;
    }

    await this.appendHistoryOrRevert(row, HistoryAction.CHECKIN, personName, notes, now);
    return this.mapToItem(row);
  }

  /**
   * Custody history for an item, most recent first
   */
  async findHistory(itemId: number): Promise<HistoryEntry[]> {
    const rows = await this.history.scan(
      { item_id: itemId },
      {
        orderBy: [
          { column: 'timestamp', ascending: false },
          { column: 'id', ascending: false },
        ],
      }
    );

    return rows.map((row) => this.mapToHistoryEntry(row));
  }

  /**
   * Delete an item, then every history entry that referenced it. On Supabase the
   * foreign key cascade has already removed them; the sweep covers the memory
   * store.
   */
  async deleteWithHistory(id: number): Promise<boolean> {
    const removed = await this.items.delete(id);
    if (!removed) {
      return false;
    }

    const removedEntries = await this.history.deleteWhere({ item_id: id });
    logger.debug('Item delete cascaded', { id, removedEntries });
    return true;
  }

  /**
   * Append the history entry for a transition that has just been written. If
   * the append fails the transition is undone, gated on the state it wrote, and
   * the storage error is rethrown.
   */
  private async appendHistoryOrRevert(
    row: Stored<ItemFields>,
    action: HistoryAction,
    personName: string,
    notes: string | null,
    timestamp: string
  ): Promise<void> {
    try {
      await this.history.insert({
        item_id: row.id,
        action,
        person_name: personName,
        timestamp,
        notes,
      });
    } catch (error) {
      logger.error('History append failed, reverting custody transition', {
        id: row.id,
        action,
        error: error instanceof Error ? error.message : String(error),
      });

      await this.revertTransition(row, action);
      throw error;
    }
  }

  private async revertTransition(row: Stored<ItemFields>, action: HistoryAction): Promise<void> {
    try {
      const reverted = await this.items.updateIf(
        row.id,
        {
          is_checked_out: row.is_checked_out,
          checked_out_by: row.checked_out_by,
          checked_out_date: row.checked_out_date,
        },
        await this.priorCustodyColumns(row.id, action)
      );

      if (!reverted) {
        logger.error('Custody transition changed before it could be reverted', { id: row.id, action });
      }
    } catch (revertError) {
      logger.error('Custody transition could not be reverted', {
        id: row.id,
        action,
        error: revertError instanceof Error ? revertError.message : String(revertError),
      });
    }
  }

  /**
   * Checkout columns as they stood before `action`. A checkout always started
   * from available; a checkin restores the holder recorded by the latest
   * checkout entry.
   */
  private async priorCustodyColumns(
    id: number,
    action: HistoryAction
  ): Promise<Pick<ItemFields, 'is_checked_out' | 'checked_out_by' | 'checked_out_date'>> {
    switch (action) {
      case HistoryAction.CHECKOUT:
        return { is_checked_out: false, checked_out_by: null, checked_out_date: null };
      case HistoryAction.CHECKIN: {
        const [lastCheckout] = await this.history.scan(
          { item_id: id, action: HistoryAction.CHECKOUT },
          {
            orderBy: [
              { column: 'timestamp', ascending: false },
              { column: 'id', ascending: false },
            ],
            limit: 1,
          }
        );

        if (!lastCheckout) {
          throw new AppError(
            ErrorCode.INTERNAL_ERROR,
            `No checkout entry to restore for item ${id}`,
            500
          );
        }

        return {
          is_checked_out: true,
          checked_out_by: lastCheckout.person_name,
          checked_out_date: lastCheckout.timestamp,
        };
      }
    }
  }

  private toColumns(details: Partial<ItemDetails>): Partial<ItemFields> {
    const columns: Partial<ItemFields> = {};

    if (details.name !== undefined) columns.name = details.name;
    if (details.description !== undefined) columns.description = details.description;
    if (details.category !== undefined) columns.category = details.category;
    if (details.barcode !== undefined) columns.barcode = details.barcode;
    if (details.serialNumber !== undefined) columns.serial_number = details.serialNumber;
    if (details.storageLocation !== undefined) columns.storage_location = details.storageLocation;
    if (details.imageUrl !== undefined) columns.image_url = details.imageUrl;
    if (details.notes !== undefined) columns.notes = details.notes;

    return columns;
  }

  /**
   * Map database row to domain model
   */
  private mapToItem(row: Stored<ItemFields>): Item {
    const base = {
      id: row.id,
      name: row.name,
      description: row.description,
      category: row.category,
      barcode: row.barcode,
      serialNumber: row.serial_number,
      storageLocation: row.storage_location,
      imageUrl: row.image_url,
      notes: row.notes,
      createdAt: new Date(row.created_date),
      updatedAt: new Date(row.last_modified_date),
    };

    if (!row.is_checked_out) {
      return { ...base, isCheckedOut: false, checkedOutBy: null, checkedOutDate: null };
    }

    if (row.checked_out_by === null || row.checked_out_date === null) {
      throw new AppError(
        ErrorCode.INTERNAL_ERROR,
        `Item ${row.id} is checked out without a holder and date`,
        500
      );
    }

    return {
      ...base,
      isCheckedOut: true,
      checkedOutBy: row.checked_out_by,
      checkedOutDate: new Date(row.checked_out_date),
    };
  }

  private mapToHistoryEntry(row: Stored<HistoryFields>): HistoryEntry {
    return {
      id: row.id,
      itemId: row.item_id,
      action: parseStoredEnum(HistoryAction, row.action, 'checkout_history.action'),
      personName: row.person_name,
      timestamp: new Date(row.timestamp),
      notes: row.notes,
    };
  }
}
