import express from 'express';
import {
  createMedication,
  createPurchase,
  deleteMedication,
  getMedication,
  listMedications,
  replaceMedication,
  updateMedication,
  updateShoppingListFlag
} from '../../controllers/api/medications.js';

const router = express.Router();

router.get('/', listMedications);
router.get('/:id', getMedication);
router.post('/', createMedication);
router.put('/:id', replaceMedication);
router.patch('/:id', updateMedication);
router.delete('/:id', deleteMedication);

router.patch('/:id/shopping-list', updateShoppingListFlag);
router.post('/:id/purchases', createPurchase);

export default router;
