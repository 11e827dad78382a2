import { CatalogRepository, CatalogRow } from '../repositories/catalog.repository';
import { UserRepository } from '../repositories/user.repository';
import { CatalogEntry, CatalogKind } from '../types/catalog.types';
import { Subject } from '../types/user.types';
import { Operation } from '../types/authorization.types';
import { ErrorCode, Errors, isAppError } from '../types/error.types';
import { assertAuthorized } from './authorization.service';
import { moduleLogger } from '../config/logger';

const logger = moduleLogger('catalog-service');

const LABELS: Record<CatalogKind, string> = {
  [CatalogKind.CATEGORY]: 'Category',
  [CatalogKind.LOCATION]: 'Location',
};

/**
 * Catalog Service
 *
 * Named lookup lists offered when describing items. One instance per list.
 */
export class CatalogService {
  private label: string;

  constructor(
    kind: CatalogKind,
    private catalogRepo: CatalogRepository,
    private userRepo: UserRepository
  ) {
    this.label = LABELS[kind];
  }

  async list(subject: Subject): Promise<CatalogEntry[]> {
    assertAuthorized(subject, Operation.READ_CATALOG);
    return this.withCreatorNames(await this.catalogRepo.findAll());
  }

  async create(subject: Subject, name: string): Promise<CatalogEntry> {
    assertAuthorized(subject, Operation.MANAGE_CATALOG);

    const trimmed = name.trim();
    if (await this.catalogRepo.findByName(trimmed)) {
      throw Errors.duplicateName(this.label, trimmed);
    }

    try {
      const row = await this.catalogRepo.create(trimmed, subject.id);
      logger.info(`${this.label} created`, { id: row.id, name: trimmed, by: subject.id });
      return { ...this.mapToEntry(row), createdByName: subject.fullName };
    } catch (error) {
      if (isAppError(error, ErrorCode.CONSTRAINT_VIOLATION)) {
        throw Errors.duplicateName(this.label, trimmed);
      }
      throw error;
    }
  }

  async rename(subject: Subject, id: number, name: string): Promise<CatalogEntry> {
    assertAuthorized(subject, Operation.MANAGE_CATALOG);

    const trimmed = name.trim();
    const holder = await this.catalogRepo.findByName(trimmed);
    if (holder && holder.id !== id) {
      throw Errors.duplicateName(this.label, trimmed);
    }

    let row: CatalogRow | null;
    try {
      row = await this.catalogRepo.rename(id, trimmed);
    } catch (error) {
      if (isAppError(error, ErrorCode.CONSTRAINT_VIOLATION)) {
        throw Errors.duplicateName(this.label, trimmed);
      }
      throw error;
    }
    if (!row) {
      throw Errors.notFound(this.label, id);
    }

    const [entry] = await this.withCreatorNames([row]);
    return entry ?? this.mapToEntry(row);
  }

  async remove(subject: Subject, id: number): Promise<void> {
    assertAuthorized(subject, Operation.MANAGE_CATALOG);

    if (!(await this.catalogRepo.delete(id))) {
      throw Errors.notFound(this.label, id);
    }

    logger.info(`${this.label} deleted`, { id, by: subject.id });
  }

  private async withCreatorNames(rows: CatalogRow[]): Promise<CatalogEntry[]> {
    const users = await this.userRepo.findAll();
    const names = new Map(users.map((user) => [user.id, user.fullName]));

    return rows.map((row) => ({
      ...this.mapToEntry(row),
      createdByName: names.get(row.created_by_id) ?? null,
    }));
  }

  private mapToEntry(row: CatalogRow): CatalogEntry {
    return {
      id: row.id,
      name: row.name,
      createdById: row.created_by_id,
      createdByName: null,
      createdAt: new Date(row.created_date),
    };
  }
}
