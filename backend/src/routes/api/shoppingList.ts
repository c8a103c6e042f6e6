import express from 'express';
import { getShoppingList } from '../../controllers/api/shoppingList.js';

const router = express.Router();

router.get('/', getShoppingList);

export default router;
