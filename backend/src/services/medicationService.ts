import type {
  MedicationCreateRequest,
  MedicationDeleteResponse,
  MedicationReplaceRequest,
  MedicationUpdateRequest,
  MedicationWithSupply,
  PurchaseRecordInput,
  SupplyStatus
} from '@pillbox/shared';
import {
  addPurchaseRecord,
  createMedication,
  deleteMedication,
  getMedicationById,
  listMedications,
  updateMedication
} from '../db/queries.js';
import type { MedicationWriteData, PurchaseRecordWriteData } from '../db/queries.js';
import { toCalendarDate } from '../utils/calendarDate.js';
import { currentDate } from '../utils/clock.js';
import { NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withDaysRemaining } from './supplyCalculator.js';

const log = createLogger('Medications');

export interface ShoppingListEntry {
  medication: MedicationWithSupply;
  supplyStatus: SupplyStatus;
}

function medicationNotFound(id: number): NotFoundError {
  return new NotFoundError('Medication not found', { id });
}

function toPurchaseWriteData(input: PurchaseRecordInput): PurchaseRecordWriteData {
  return {
    price: input.price,
    place: input.place,
    purchasedAt: toCalendarDate(input.purchasedAt ?? null)
  };
}

function toWriteData(payload: MedicationCreateRequest): MedicationWriteData {
  return {
    name: payload.name,
    dailyDose: payload.dailyDose,
    boxSize: payload.boxSize,
    insuranceId: payload.insuranceId ?? null,
    onShoppingList: payload.onShoppingList ?? false
  };
}

function toPartialWriteData(payload: MedicationUpdateRequest): Partial<MedicationWriteData> {
  const result: Partial<MedicationWriteData> = {};
  if (payload.name !== undefined) {
    result.name = payload.name;
  }
  if (payload.dailyDose !== undefined) {
    result.dailyDose = payload.dailyDose;
  }
  if (payload.boxSize !== undefined) {
    result.boxSize = payload.boxSize;
  }
  if (payload.insuranceId !== undefined) {
    result.insuranceId = payload.insuranceId;
  }
  if (payload.onShoppingList !== undefined) {
    result.onShoppingList = payload.onShoppingList;
  }
  return result;
}

/**
 * Presentation label for a days-remaining value. Anything at or below zero is
 * exhausted; the calculator itself leaves negative values as they are.
 */
export function resolveSupplyStatus(daysRemaining: number, thresholdDays: number): SupplyStatus {
  if (daysRemaining <= 0) {
    return 'exhausted';
  }
  if (daysRemaining <= thresholdDays) {
    return 'low';
  }
  return 'ok';
}

export async function listTrackedMedications(): Promise<MedicationWithSupply[]> {
  const today = currentDate();
  const medications = await listMedications();
  return medications.map((medication) => withDaysRemaining(medication, today));
}

export async function getTrackedMedication(id: number): Promise<MedicationWithSupply> {
  const medication = await getMedicationById(id);
  if (!medication) {
    throw medicationNotFound(id);
  }
  return withDaysRemaining(medication, currentDate());
}

export async function createTrackedMedication(payload: MedicationCreateRequest): Promise<MedicationWithSupply> {
  const today = currentDate();
  const medication = await createMedication(
    toWriteData(payload),
    today,
    (payload.purchaseHistory ?? []).map(toPurchaseWriteData)
  );
  log.info('Medication created', { id: medication.id });
  return withDaysRemaining(medication, today);
}

export async function replaceTrackedMedication(
  id: number,
  payload: MedicationReplaceRequest
): Promise<MedicationWithSupply> {
  const purchases = payload.purchaseHistory?.map(toPurchaseWriteData);
  const medication = await updateMedication(id, toWriteData(payload), purchases);
  if (!medication) {
    throw medicationNotFound(id);
  }
  return withDaysRemaining(medication, currentDate());
}

export async function updateTrackedMedication(
  id: number,
  payload: MedicationUpdateRequest
): Promise<MedicationWithSupply> {
  const medication = await updateMedication(id, toPartialWriteData(payload));
  if (!medication) {
    throw medicationNotFound(id);
  }
  return withDaysRemaining(medication, currentDate());
}

export async function setShoppingListFlag(id: number, onShoppingList: boolean): Promise<MedicationWithSupply> {
  return updateTrackedMedication(id, { onShoppingList });
}

export async function recordPurchase(id: number, purchase: PurchaseRecordInput): Promise<MedicationWithSupply> {
  const medication = await addPurchaseRecord(id, toPurchaseWriteData(purchase));
  if (!medication) {
    throw medicationNotFound(id);
  }
  return withDaysRemaining(medication, currentDate());
}

export async function deleteTrackedMedication(id: number): Promise<MedicationDeleteResponse> {
  const deleted = await deleteMedication(id);
  if (!deleted) {
    throw medicationNotFound(id);
  }
  log.info('Medication deleted', { id });
  return { deletedMedicationId: id };
}

// Without a start date or a positive dose there is no projection to act on.
function hasSupplyProjection(medication: MedicationWithSupply): boolean {
  return medication.startDate !== null && medication.dailyDose > 0;
}

/**
 * Medications to buy: those flagged by the user plus those whose projected
 * supply is at or below `thresholdDays`.
 */
export async function buildShoppingList(thresholdDays: number): Promise<ShoppingListEntry[]> {
  const medications = await listTrackedMedications();
  return medications
    .map((medication) => ({
      medication,
      supplyStatus: resolveSupplyStatus(medication.daysRemaining, thresholdDays)
    }))
    .filter(
      ({ medication, supplyStatus }) =>
        medication.onShoppingList || (hasSupplyProjection(medication) && supplyStatus !== 'ok')
    );
}
