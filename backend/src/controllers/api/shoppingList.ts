import type { Request, Response } from 'express';
import type { ShoppingListPayload } from '@pillbox/shared';
import { getAppConfig } from '../../config.js';
import { buildShoppingList } from '../../services/medicationService.js';
import { route } from '../../utils/httpHandler.js';
import { toShoppingListItemPayload } from '../../utils/medicationPayload.js';

export const getShoppingList = route(async (_req: Request, res: Response) => {
  const { lowSupplyThresholdDays } = getAppConfig();
  const entries = await buildShoppingList(lowSupplyThresholdDays);
  const payload: ShoppingListPayload = {
    lowSupplyThresholdDays,
    items: entries.map(({ medication, supplyStatus }) => toShoppingListItemPayload(medication, supplyStatus))
  };
  res.json(payload);
});
