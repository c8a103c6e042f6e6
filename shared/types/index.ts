/**
 * Shared TypeScript types for Pillbox
 * Used by the backend and any client of the medication API
 */

// ========== MEDICATIONS ==========

export interface PurchaseRecord {
  price: number;
  place: string;
  purchasedAt: Date | null;
}

export interface Medication {
  id: number;
  name: string;
  dailyDose: number;
  boxSize: number;
  insuranceId: string | null;
  startDate: Date | null; // calendar date, local midnight
  onShoppingList: boolean;
  purchaseHistory: PurchaseRecord[];
  createdAt: Date;
  updatedAt: Date;
}

export interface MedicationWithSupply extends Medication {
  daysRemaining: number;
}

// ========== SUPPLY ==========

export const SUPPLY_STATUSES = ['ok', 'low', 'exhausted'] as const;
export type SupplyStatus = (typeof SUPPLY_STATUSES)[number];

// ========== API PAYLOADS ==========

export interface PurchaseRecordPayload extends Omit<PurchaseRecord, 'purchasedAt'> {
  purchasedAt: string | null; // YYYY-MM-DD
}

export interface MedicationPayload
  extends Omit<MedicationWithSupply, 'startDate' | 'purchaseHistory' | 'createdAt' | 'updatedAt'> {
  startDate: string | null; // YYYY-MM-DD
  purchaseHistory: PurchaseRecordPayload[];
  createdAt: string;
  updatedAt: string;
}

export interface MedicationListPayload {
  medications: MedicationPayload[];
}

export interface MedicationDeleteResponse {
  deletedMedicationId: number;
}

export interface ShoppingListItemPayload extends MedicationPayload {
  supplyStatus: SupplyStatus;
}

export interface ShoppingListPayload {
  lowSupplyThresholdDays: number;
  items: ShoppingListItemPayload[];
}

// ========== API REQUESTS ==========

export interface PurchaseRecordInput {
  price: number;
  place: string;
  purchasedAt?: string | null;
}

export interface MedicationCreateRequest {
  name: string;
  dailyDose: number;
  boxSize: number;
  insuranceId?: string | null;
  onShoppingList?: boolean;
  purchaseHistory?: PurchaseRecordInput[];
}

// PUT replaces every editable field; startDate and daysRemaining are never accepted.
export type MedicationReplaceRequest = MedicationCreateRequest;

export interface MedicationUpdateRequest {
  name?: string;
  dailyDose?: number;
  boxSize?: number;
  insuranceId?: string | null;
  onShoppingList?: boolean;
}

export interface ShoppingListFlagRequest {
  onShoppingList: boolean;
}
