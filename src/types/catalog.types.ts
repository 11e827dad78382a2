/**
 * Category and storage location lookup lists
 */

export enum CatalogKind {
  CATEGORY = 'category',
  LOCATION = 'location',
}

export interface CatalogEntry {
  id: number;
  name: string;
  createdById: number;
  createdByName: string | null;
  createdAt: Date;
}

// Database row type (snake_case from PostgreSQL)
export interface CatalogFields {
  name: string;
  created_by_id: number;
  created_date: string;
}
