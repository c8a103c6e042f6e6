import type { Medication, PurchaseRecord } from '@pillbox/shared';
import { formatCalendarDate, toCalendarDate } from '../../utils/calendarDate.js';
import { db, withTransaction, type Executor } from './shared.js';

interface MedicationRow {
  id: number;
  name: string;
  daily_dose: number;
  box_size: number;
  insurance_id: string | null;
  start_date: Date | string | null;
  on_shopping_list: boolean;
  created_at: Date;
  updated_at: Date;
}

interface PurchaseRecordRow {
  id: number;
  medication_id: number;
  price: string | number;
  place: string;
  purchased_at: Date | string | null;
  created_at: Date;
}

export interface MedicationWriteData {
  name: string;
  dailyDose: number;
  boxSize: number;
  insuranceId?: string | null;
  onShoppingList?: boolean;
}

export interface PurchaseRecordWriteData {
  price: number;
  place: string;
  purchasedAt?: Date | null;
}

function normalizeOptionalText(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

function normalizeRequiredText(value: string | null | undefined, field: string): string {
  const normalized = normalizeOptionalText(value);
  if (!normalized) {
    throw new Error(`${field} is required`);
  }
  return normalized;
}

function normalizeCount(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${field} must be a non-negative integer`);
  }
  return value;
}

function toPurchaseRecord(row: PurchaseRecordRow): PurchaseRecord {
  return {
    price: Number(row.price),
    place: row.place,
    purchasedAt: toCalendarDate(row.purchased_at)
  };
}

export function medicationRowToMedication(row: MedicationRow, purchases: PurchaseRecordRow[] = []): Medication {
  return {
    id: row.id,
    name: row.name,
    dailyDose: row.daily_dose,
    boxSize: row.box_size,
    insuranceId: row.insurance_id,
    startDate: toCalendarDate(row.start_date),
    onShoppingList: row.on_shopping_list,
    purchaseHistory: purchases.map(toPurchaseRecord),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

type MedicationField = keyof MedicationWriteData;

const MEDICATION_FIELD_ORDER: MedicationField[] = [
  'name',
  'dailyDose',
  'boxSize',
  'insuranceId',
  'onShoppingList'
];

const MEDICATION_COLUMN_MAP: Record<MedicationField, keyof MedicationRow> = {
  name: 'name',
  dailyDose: 'daily_dose',
  boxSize: 'box_size',
  insuranceId: 'insurance_id',
  onShoppingList: 'on_shopping_list'
};

function transformMedicationField(data: Partial<MedicationWriteData>, key: MedicationField): unknown {
  switch (key) {
    case 'name':
      return normalizeRequiredText(data.name, 'Medication name');
    case 'dailyDose':
      return normalizeCount(data.dailyDose ?? 0, 'Daily dose');
    case 'boxSize':
      return normalizeCount(data.boxSize ?? 0, 'Box size');
    case 'insuranceId':
      return normalizeOptionalText(data.insuranceId);
    case 'onShoppingList':
      return data.onShoppingList ?? false;
  }
}

function buildMedicationUpdate(data: Partial<MedicationWriteData>) {
  const sets: string[] = [];
  const values: unknown[] = [];

  for (const key of MEDICATION_FIELD_ORDER) {
    if (data[key] === undefined) continue;
    sets.push(`${MEDICATION_COLUMN_MAP[key]} = $${sets.length + 1}`);
    values.push(transformMedicationField(data, key));
  }

  return { sets, values };
}

async function insertPurchaseRows(
  executor: Executor,
  medicationId: number,
  records: PurchaseRecordWriteData[]
): Promise<void> {
  for (const record of records) {
    await executor.query(
      `INSERT INTO purchase_records (medication_id, price, place, purchased_at)
       VALUES ($1, $2, $3, $4)`,
      [
        medicationId,
        record.price,
        normalizeRequiredText(record.place, 'Purchase place'),
        record.purchasedAt ? formatCalendarDate(record.purchasedAt) : null
      ]
    );
  }
}

async function loadPurchaseRows(executor: Executor, medicationId: number): Promise<PurchaseRecordRow[]> {
  const result = await executor.query<PurchaseRecordRow>(
    `SELECT * FROM purchase_records WHERE medication_id = $1 ORDER BY id`,
    [medicationId]
  );
  return result.rows;
}

export async function listMedications(): Promise<Medication[]> {
  const [medications, purchases] = await Promise.all([
    db.query<MedicationRow>(`SELECT * FROM medications ORDER BY id`),
    db.query<PurchaseRecordRow>(`SELECT * FROM purchase_records ORDER BY medication_id, id`)
  ]);

  const purchasesByMedication = new Map<number, PurchaseRecordRow[]>();
  for (const row of purchases.rows) {
    const list = purchasesByMedication.get(row.medication_id) ?? [];
    list.push(row);
    purchasesByMedication.set(row.medication_id, list);
  }

  return medications.rows.map((row) => medicationRowToMedication(row, purchasesByMedication.get(row.id) ?? []));
}

export async function getMedicationById(id: number): Promise<Medication | null> {
  const result = await db.query<MedicationRow>(`SELECT * FROM medications WHERE id = $1`, [id]);
  const row = result.rows[0];
  if (!row) {
    return null;
  }
  return medicationRowToMedication(row, await loadPurchaseRows(db, id));
}

export async function createMedication(
  data: MedicationWriteData,
  startDate: Date,
  purchases: PurchaseRecordWriteData[] = []
): Promise<Medication> {
  return withTransaction(async (client) => {
    const result = await client.query<MedicationRow>(
      `INSERT INTO medications (name, daily_dose, box_size, insurance_id, on_shopping_list, start_date)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [
        ...MEDICATION_FIELD_ORDER.map((key) => transformMedicationField(data, key)),
        formatCalendarDate(startDate)
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Medication insert returned no row');
    }
    await insertPurchaseRows(client, row.id, purchases);
    return medicationRowToMedication(row, await loadPurchaseRows(client, row.id));
  });
}

/**
 * Updates the given fields and, when `purchases` is provided, replaces the
 * whole purchase history. `start_date` is never part of the update.
 */
export async function updateMedication(
  id: number,
  data: Partial<MedicationWriteData>,
  purchases?: PurchaseRecordWriteData[]
): Promise<Medication | null> {
  const { sets, values } = buildMedicationUpdate(data);

  return withTransaction(async (client) => {
    const params = [...values, id];
    const result = await client.query<MedicationRow>(
      `UPDATE medications
       SET ${[...sets, 'updated_at = NOW()'].join(', ')}
       WHERE id = $${params.length}
       RETURNING *`,
      params
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    if (purchases) {
      await client.query(`DELETE FROM purchase_records WHERE medication_id = $1`, [id]);
      await insertPurchaseRows(client, id, purchases);
    }

    return medicationRowToMedication(row, await loadPurchaseRows(client, id));
  });
}

export async function addPurchaseRecord(
  medicationId: number,
  record: PurchaseRecordWriteData
): Promise<Medication | null> {
  return withTransaction(async (client) => {
    const result = await client.query<MedicationRow>(
      `UPDATE medications SET updated_at = NOW() WHERE id = $1 RETURNING *`,
      [medicationId]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    await insertPurchaseRows(client, medicationId, [record]);
    return medicationRowToMedication(row, await loadPurchaseRows(client, medicationId));
  });
}

/** Purchase history goes with the medication through `ON DELETE CASCADE`. */
export async function deleteMedication(id: number): Promise<boolean> {
  const result = await db.query(`DELETE FROM medications WHERE id = $1`, [id]);
  return (result.rowCount ?? 0) > 0;
}
