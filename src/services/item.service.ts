import { ItemRepository } from '../repositories/item.repository';
import {
  CreateItemInput,
  CustodyInput,
  HistoryEntry,
  InventoryStats,
  Item,
  UpdateItemInput,
} from '../types/item.types';
import { Subject } from '../types/user.types';
import { Operation } from '../types/authorization.types';
import { AppError, ErrorCode, Errors, isAppError } from '../types/error.types';
import { assertAuthorized } from './authorization.service';
import { moduleLogger } from '../config/logger';

const logger = moduleLogger('item-service');

const UNCATEGORIZED = 'Uncategorized';

/**
 * Item Service
 *
 * Item lifecycle: descriptive CRUD plus the Available ⇄ CheckedOut custody
 * transition and its history ledger. Every operation authorizes the subject
 * before it reads or writes anything.
 */
export class ItemService {
  constructor(private itemRepo: ItemRepository) {}

  async listItems(subject: Subject): Promise<Item[]> {
    assertAuthorized(subject, Operation.READ_ITEMS);
    return this.itemRepo.findAll();
  }

  async getItem(subject: Subject, id: number): Promise<Item> {
    assertAuthorized(subject, Operation.READ_ITEMS);
    return this.requireItem(id);
  }

  /**
   * Case-insensitive substring match over name, description and barcode
   */
  async searchItems(subject: Subject, query: string): Promise<Item[]> {
    assertAuthorized(subject, Operation.READ_ITEMS);
    logger.debug('Searching items', { query });

    const needle = query.trim().toLowerCase();
    const items = await this.itemRepo.findAll();

    return items.filter((item) =>
      [item.name, item.description, item.barcode].some(
        (value) => value !== null && value.toLowerCase().includes(needle)
      )
    );
  }

  async createItem(subject: Subject, input: CreateItemInput): Promise<Item> {
    assertAuthorized(subject, Operation.CREATE_ITEM);
    logger.info('Creating item', { name: input.name, by: subject.id });

    const barcode = normalizeBarcode(input.barcode);
    if (barcode !== null && (await this.itemRepo.findByBarcode(barcode))) {
      throw Errors.duplicateBarcode(barcode);
    }

    try {
      const item = await this.itemRepo.create({
        name: input.name,
        description: input.description ?? null,
        category: input.category ?? null,
        barcode,
        serialNumber: input.serialNumber ?? null,
        storageLocation: input.storageLocation ?? null,
        imageUrl: input.imageUrl ?? null,
        notes: input.notes ?? null,
      });

      logger.info('Item created successfully', { itemId: item.id });
      return item;
    } catch (error) {
      // Another writer took the barcode between the check and the insert
      if (barcode !== null && isAppError(error, ErrorCode.CONSTRAINT_VIOLATION)) {
        throw Errors.duplicateBarcode(barcode);
      }
      throw error;
    }
  }

  /**
   * Merge the provided fields over the stored item. Checkout state is not
   * writable here.
   */
  async updateItem(subject: Subject, id: number, input: UpdateItemInput): Promise<Item> {
    assertAuthorized(subject, Operation.UPDATE_ITEM);
    logger.info('Updating item', { id, fields: Object.keys(input), by: subject.id });

    await this.requireItem(id);

    const changes = { ...input };
    if (input.barcode !== undefined) {
      changes.barcode = normalizeBarcode(input.barcode);
      const barcode = changes.barcode;
      if (barcode !== null) {
        const holder = await this.itemRepo.findByBarcode(barcode);
        if (holder && holder.id !== id) throw Errors.duplicateBarcode(barcode);
      }
    }

    try {
      const updated = await this.itemRepo.updateDetails(id, changes);
      if (!updated) throw Errors.notFound('Item', id);
      return updated;
    } catch (error) {
      if (isAppError(error, ErrorCode.CONSTRAINT_VIOLATION) && changes.barcode) {
        throw Errors.duplicateBarcode(changes.barcode);
      }
      throw error;
    }
  }

  /**
   * Delete an item together with its history
   */
  async deleteItem(subject: Subject, id: number): Promise<void> {
    assertAuthorized(subject, Operation.DELETE_ITEM);
    logger.info('Deleting item', { id, by: subject.id });

    const removed = await this.itemRepo.deleteWithHistory(id);
    if (!removed) {
      throw Errors.notFound('Item', id);
    }

    logger.info('Item deleted', { id });
  }

  /**
   * Check an item out to a person
   *
   * Concurrency approach:
   * The repository issues one conditional UPDATE gated on the item being
   * available. Concurrent checkouts are serialized by the store; exactly one
   * gets the row back and the rest fall through to the failure path below,
   * which only reads to build the error.
   */
  async checkoutItem(subject: Subject, id: number, input: CustodyInput): Promise<Item> {
    assertAuthorized(subject, Operation.CHECKOUT_CHECKIN);
    logger.info('Checking out item', { id, personName: input.personName, by: subject.id });

    const item = await this.itemRepo.checkoutAtomic(id, input.personName, emptyToNull(input.notes));

    if (item) {
      logger.info('Item checked out', { id, checkedOutBy: input.personName });
      return item;
    }

    const current = await this.itemRepo.findById(id);
    if (!current) {
      throw Errors.notFound('Item', id);
    }

    if (current.isCheckedOut) {
      throw Errors.alreadyCheckedOut(current.checkedOutBy);
    }

    // Checked out and back in again between the write and this read
    throw new AppError(
      ErrorCode.ALREADY_CHECKED_OUT,
      'Item was checked out concurrently; reload and try again',
      409
    );
  }

  /**
   * Check an item back in. The person checking in need not be the person who
   * checked it out.
   */
  async checkinItem(subject: Subject, id: number, input: CustodyInput): Promise<Item> {
    assertAuthorized(subject, Operation.CHECKOUT_CHECKIN);
    logger.info('Checking in item', { id, personName: input.personName, by: subject.id });

    const item = await this.itemRepo.checkinAtomic(id, input.personName, emptyToNull(input.notes));

    if (item) {
      logger.info('Item checked in', { id });
      return item;
    }

    const current = await this.itemRepo.findById(id);
    if (!current) {
      throw Errors.notFound('Item', id);
    }

    throw Errors.notCheckedOut();
  }

  /**
   * Custody history, most recent first
   */
  async getHistory(subject: Subject, id: number): Promise<HistoryEntry[]> {
    assertAuthorized(subject, Operation.READ_ITEMS);

    await this.requireItem(id);
    return this.itemRepo.findHistory(id);
  }

  async getStats(subject: Subject): Promise<InventoryStats> {
    assertAuthorized(subject, Operation.VIEW_STATS);

    const items = await this.itemRepo.findAll();
    const checkedOut = items.filter((item) => item.isCheckedOut).length;

    const counts = new Map<string, number>();
    for (const item of items) {
      const category = item.category || UNCATEGORIZED;
      counts.set(category, (counts.get(category) ?? 0) + 1);
    }

    return {
      totalItems: items.length,
      checkedOut,
      available: items.length - checkedOut,
      categories: Object.fromEntries(counts),
    };
  }

  private async requireItem(id: number): Promise<Item> {
    const item = await this.itemRepo.findById(id);

    if (!item) {
      throw Errors.notFound('Item', id);
    }

    return item;
  }
}

// Blank barcodes are stored as NULL so they never collide on the unique index
function normalizeBarcode(barcode: string | null | undefined): string | null {
  const trimmed = barcode?.trim();
  return trimmed ? trimmed : null;
}

function emptyToNull(value: string | undefined): string | null {
  return value ? value : null;
}
