import type { Express, Router } from 'express';
import apiMedicationRoutes from './api/medications.js';
import apiShoppingListRoutes from './api/shoppingList.js';
import { ROUTER_METADATA, API_ROUTE_METADATA, type RouterMeta, type RouteMeta } from './registry.metadata.js';

export interface RouterRegistration extends RouterMeta {
  router: Router;
}

export type RouteDefinition = RouteMeta;

const routerLookup: Record<string, Router | undefined> = {
  '/api/medications': apiMedicationRoutes,
  '/api/shopping-list': apiShoppingListRoutes
};

export const ROUTER_REGISTRATIONS: RouterRegistration[] = ROUTER_METADATA.flatMap((meta) => {
  const router = routerLookup[meta.basePath];
  return router ? [{ ...meta, router }] : [];
});

export const API_ROUTE_MAP: RouteDefinition[] = [...API_ROUTE_METADATA];

export function registerRoutes(app: Express): void {
  ROUTER_REGISTRATIONS.forEach(({ basePath, router }) => {
    app.use(basePath, router);
  });
}
