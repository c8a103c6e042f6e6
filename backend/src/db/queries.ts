export {
  listMedications,
  getMedicationById,
  createMedication,
  updateMedication,
  addPurchaseRecord,
  deleteMedication
} from './queries/medications.js';

export type { MedicationWriteData, PurchaseRecordWriteData } from './queries/medications.js';

export { withTransaction } from './queries/shared.js';
