import type { Request, Response } from 'express';
import type { MedicationListPayload } from '@pillbox/shared';
import {
  createTrackedMedication,
  deleteTrackedMedication,
  getTrackedMedication,
  listTrackedMedications,
  recordPurchase,
  replaceTrackedMedication,
  setShoppingListFlag,
  updateTrackedMedication
} from '../../services/medicationService.js';
import {
  medicationCreateSchema,
  medicationIdParamsSchema,
  medicationReplaceSchema,
  medicationUpdateSchema,
  purchaseRecordSchema,
  shoppingListFlagSchema
} from '../../validators/medications.js';
import { route } from '../../utils/httpHandler.js';
import { toMedicationPayload } from '../../utils/medicationPayload.js';
import { validateBody, validateParams } from '../../utils/validation.js';

export const listMedications = route(async (_req: Request, res: Response) => {
  const medications = await listTrackedMedications();
  const payload: MedicationListPayload = { medications: medications.map(toMedicationPayload) };
  res.json(payload);
});

export const getMedication = route(async (req: Request, res: Response) => {
  const params = validateParams(req, medicationIdParamsSchema);
  const medication = await getTrackedMedication(params.id);
  res.json(toMedicationPayload(medication));
});

export const createMedication = route(async (req: Request, res: Response) => {
  const payload = validateBody(req, medicationCreateSchema);
  const medication = await createTrackedMedication(payload);
  res.status(201).json(toMedicationPayload(medication));
});

export const replaceMedication = route(async (req: Request, res: Response) => {
  const params = validateParams(req, medicationIdParamsSchema);
  const payload = validateBody(req, medicationReplaceSchema);
  const medication = await replaceTrackedMedication(params.id, payload);
  res.json(toMedicationPayload(medication));
});

export const updateMedication = route(async (req: Request, res: Response) => {
  const params = validateParams(req, medicationIdParamsSchema);
  const payload = validateBody(req, medicationUpdateSchema);
  const medication = await updateTrackedMedication(params.id, payload);
  res.json(toMedicationPayload(medication));
});

export const updateShoppingListFlag = route(async (req: Request, res: Response) => {
  const params = validateParams(req, medicationIdParamsSchema);
  const { onShoppingList } = validateBody(req, shoppingListFlagSchema);
  const medication = await setShoppingListFlag(params.id, onShoppingList);
  res.json(toMedicationPayload(medication));
});

export const createPurchase = route(async (req: Request, res: Response) => {
  const params = validateParams(req, medicationIdParamsSchema);
  const payload = validateBody(req, purchaseRecordSchema);
  const medication = await recordPurchase(params.id, payload);
  res.status(201).json(toMedicationPayload(medication));
});

export const deleteMedication = route(async (req: Request, res: Response) => {
  const params = validateParams(req, medicationIdParamsSchema);
  const result = await deleteTrackedMedication(params.id);
  res.json(result);
});
