import type {
  MedicationPayload,
  MedicationWithSupply,
  PurchaseRecord,
  PurchaseRecordPayload,
  ShoppingListItemPayload,
  SupplyStatus
} from '@pillbox/shared';
import { formatCalendarDate } from './calendarDate.js';

export function toPurchaseRecordPayload(record: PurchaseRecord): PurchaseRecordPayload {
  return {
    price: record.price,
    place: record.place,
    purchasedAt: record.purchasedAt ? formatCalendarDate(record.purchasedAt) : null
  };
}

export function toMedicationPayload(medication: MedicationWithSupply): MedicationPayload {
  return {
    ...medication,
    startDate: medication.startDate ? formatCalendarDate(medication.startDate) : null,
    purchaseHistory: medication.purchaseHistory.map(toPurchaseRecordPayload),
    createdAt: medication.createdAt.toISOString(),
    updatedAt: medication.updatedAt.toISOString()
  };
}

export function toShoppingListItemPayload(
  medication: MedicationWithSupply,
  supplyStatus: SupplyStatus
): ShoppingListItemPayload {
  return {
    ...toMedicationPayload(medication),
    supplyStatus
  };
}
