import { beforeEach, describe, expect, it, vi } from 'vitest';

const dbMocks = vi.hoisted(() => ({
  query: vi.fn()
}));

type TransactionWork = (client: typeof dbMocks) => Promise<unknown>;

const transactionMock = vi.hoisted(() => vi.fn());

vi.mock('../shared.js', () => ({
  db: dbMocks,
  withTransaction: transactionMock
}));

const {
  medicationRowToMedication,
  listMedications,
  getMedicationById,
  createMedication,
  updateMedication,
  addPurchaseRecord,
  deleteMedication
} = await import('../medications.js');

const baseMedicationRow = {
  id: 42,
  name: 'Dipyrone',
  daily_dose: 3,
  box_size: 30,
  insurance_id: 'policy-123',
  start_date: new Date(2026, 9, 1),
  on_shopping_list: false,
  created_at: new Date('2026-10-01T09:00:00Z'),
  updated_at: new Date('2026-10-02T09:00:00Z')
};

const basePurchaseRow = {
  id: 5,
  medication_id: 42,
  price: '15.50',
  place: 'Pharmacy A',
  purchased_at: '2026-09-30',
  created_at: new Date('2026-10-01T09:00:00Z')
};

beforeEach(() => {
  dbMocks.query.mockReset();
  transactionMock.mockReset();
  transactionMock.mockImplementation(async (work: TransactionWork) => work(dbMocks));
});

describe('medication row mapping', () => {
  it('maps raw rows into domain types', () => {
    const medication = medicationRowToMedication(baseMedicationRow, [basePurchaseRow]);

    expect(medication).toEqual({
      id: 42,
      name: 'Dipyrone',
      dailyDose: 3,
      boxSize: 30,
      insuranceId: 'policy-123',
      startDate: new Date(2026, 9, 1),
      onShoppingList: false,
      purchaseHistory: [{ price: 15.5, place: 'Pharmacy A', purchasedAt: new Date(2026, 8, 30) }],
      createdAt: baseMedicationRow.created_at,
      updatedAt: baseMedicationRow.updated_at
    });
  });

  it('treats an unreadable start date as absent', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const medication = medicationRowToMedication({ ...baseMedicationRow, start_date: 'not-a-date' });

    expect(medication.startDate).toBeNull();
  });
});

describe('medication queries', () => {
  it('lists medications with their purchase history grouped', async () => {
    dbMocks.query
      .mockResolvedValueOnce({ rows: [baseMedicationRow, { ...baseMedicationRow, id: 43 }], rowCount: 2 })
      .mockResolvedValueOnce({
        rows: [basePurchaseRow, { ...basePurchaseRow, id: 6, price: 16, place: 'Pharmacy B' }],
        rowCount: 2
      });

    const medications = await listMedications();

    expect(medications.map((medication) => medication.id)).toEqual([42, 43]);
    expect(medications[0]?.purchaseHistory.map((record) => record.place)).toEqual(['Pharmacy A', 'Pharmacy B']);
    expect(medications[1]?.purchaseHistory).toEqual([]);
  });

  it('returns null for an unknown id without loading purchases', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(getMedicationById(99)).resolves.toBeNull();
    expect(dbMocks.query).toHaveBeenCalledTimes(1);
  });

  it('creates a medication with normalized fields, start date and purchases', async () => {
    dbMocks.query
      .mockResolvedValueOnce({ rows: [baseMedicationRow], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [basePurchaseRow], rowCount: 1 });

    const created = await createMedication(
      { name: '  Dipyrone ', dailyDose: 3, boxSize: 30, insuranceId: '   ' },
      new Date(2026, 9, 18),
      [{ price: 15.5, place: ' Pharmacy A ', purchasedAt: new Date(2026, 8, 30) }]
    );

    expect(transactionMock).toHaveBeenCalledTimes(1);
    const [insertSql, insertParams] = dbMocks.query.mock.calls[0] as [string, unknown[]];
    expect(insertSql).toContain('INSERT INTO medications');
    expect(insertParams).toEqual(['Dipyrone', 3, 30, null, false, '2026-10-18']);

    const [purchaseSql, purchaseParams] = dbMocks.query.mock.calls[1] as [string, unknown[]];
    expect(purchaseSql).toContain('INSERT INTO purchase_records');
    expect(purchaseParams).toEqual([42, 15.5, 'Pharmacy A', '2026-09-30']);

    expect(created.purchaseHistory).toHaveLength(1);
  });

  it('rejects a negative dose before touching the database', async () => {
    await expect(
      createMedication({ name: 'Dipyrone', dailyDose: -1, boxSize: 30 }, new Date(2026, 9, 18))
    ).rejects.toThrow('Daily dose must be a non-negative integer');
    expect(dbMocks.query).not.toHaveBeenCalled();
  });

  it('updates only the provided fields and never the start date', async () => {
    dbMocks.query
      .mockResolvedValueOnce({ rows: [{ ...baseMedicationRow, box_size: 60 }], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });

    const updated = await updateMedication(42, { boxSize: 60, onShoppingList: true });

    const [updateSql, updateParams] = dbMocks.query.mock.calls[0] as [string, unknown[]];
    expect(updateSql).toContain('SET box_size = $1, on_shopping_list = $2, updated_at = NOW()');
    expect(updateSql).toContain('WHERE id = $3');
    expect(updateSql).not.toContain('start_date');
    expect(updateParams).toEqual([60, true, 42]);
    expect(updated?.boxSize).toBe(60);
  });

  it('replaces the purchase history when one is given', async () => {
    dbMocks.query
      .mockResolvedValueOnce({ rows: [baseMedicationRow], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 2 })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [{ ...basePurchaseRow, place: 'Pharmacy C' }], rowCount: 1 });

    const updated = await updateMedication(42, { name: 'Dipyrone' }, [{ price: 12, place: 'Pharmacy C' }]);

    const [deleteSql, deleteParams] = dbMocks.query.mock.calls[1] as [string, unknown[]];
    expect(deleteSql).toContain('DELETE FROM purchase_records');
    expect(deleteParams).toEqual([42]);
    const [, insertParams] = dbMocks.query.mock.calls[2] as [string, unknown[]];
    expect(insertParams).toEqual([42, 12, 'Pharmacy C', null]);
    expect(updated?.purchaseHistory.map((record) => record.place)).toEqual(['Pharmacy C']);
  });

  it('returns null when updating a missing medication', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(updateMedication(99, { name: 'Missing' }, [])).resolves.toBeNull();
    expect(dbMocks.query).toHaveBeenCalledTimes(1);
  });

  it('appends a purchase record to an existing medication', async () => {
    dbMocks.query
      .mockResolvedValueOnce({ rows: [baseMedicationRow], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [basePurchaseRow], rowCount: 1 });

    const medication = await addPurchaseRecord(42, { price: 15.5, place: 'Pharmacy A' });

    const [touchSql] = dbMocks.query.mock.calls[0] as [string, unknown[]];
    expect(touchSql).toContain('UPDATE medications SET updated_at = NOW()');
    expect(medication?.purchaseHistory).toHaveLength(1);
  });

  it('deletes the medication row and leaves its history to the cascade', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    await expect(deleteMedication(42)).resolves.toBe(true);

    expect(dbMocks.query).toHaveBeenCalledTimes(1);
    expect(dbMocks.query).toHaveBeenCalledWith('DELETE FROM medications WHERE id = $1', [42]);
    expect(transactionMock).not.toHaveBeenCalled();
  });

  it('reports false when there was nothing to delete', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(deleteMedication(42)).resolves.toBe(false);
  });
});
