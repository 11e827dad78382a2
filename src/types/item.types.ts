/**
 * Item domain types
 */

export enum HistoryAction {
  CHECKOUT = 'checkout',
  CHECKIN = 'checkin',
}

export interface ItemDetails {
  name: string;
  description: string | null;
  category: string | null;
  barcode: string | null;
  serialNumber: string | null;
  storageLocation: string | null;
  imageUrl: string | null;
  notes: string | null;
}

/**
 * Holder and checkout date exist exactly when the item is checked out.
 */
export type CheckoutState =
  | { isCheckedOut: false; checkedOutBy: null; checkedOutDate: null }
  | { isCheckedOut: true; checkedOutBy: string; checkedOutDate: Date };

export type Item = ItemDetails &
  CheckoutState & {
    id: number;
    createdAt: Date;
    updatedAt: Date;
  };

export interface HistoryEntry {
  id: number;
  itemId: number;
  action: HistoryAction;
  personName: string;
  timestamp: Date;
  notes: string | null;
}

// Database row types (snake_case from PostgreSQL)
export interface ItemFields {
  name: string;
  description: string | null;
  category: string | null;
  barcode: string | null;
  serial_number: string | null;
  storage_location: string | null;
  is_checked_out: boolean;
  checked_out_by: string | null;
  checked_out_date: string | null;
  image_url: string | null;
  notes: string | null;
  created_date: string;
  last_modified_date: string;
}

export interface HistoryFields {
  item_id: number;
  action: string;
  person_name: string;
  timestamp: string;
  notes: string | null;
}

// Create item input
export type CreateItemInput = Pick<ItemDetails, 'name'> &
  Partial<Omit<ItemDetails, 'name'>>;

// Partial update; a null clears the field
export type UpdateItemInput = Partial<ItemDetails>;

export interface CustodyInput {
  personName: string;
  notes?: string;
}

export interface InventoryStats {
  totalItems: number;
  checkedOut: number;
  available: number;
  categories: Record<string, number>;
}
