export interface RouterMeta {
  basePath: string;
  description: string;
}

export interface RouteMeta {
  method: 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';
  path: string;
  description: string;
}

export const ROUTER_METADATA: RouterMeta[] = [
  { basePath: '/api/medications', description: 'Medication inventory APIs' },
  { basePath: '/api/shopping-list', description: 'Medications due for repurchase' }
];

export const API_ROUTE_METADATA: RouteMeta[] = [
  { method: 'GET', path: '/api/medications', description: 'List medications with days remaining' },
  { method: 'GET', path: '/api/medications/:id', description: 'Fetch medication by id' },
  { method: 'POST', path: '/api/medications', description: 'Track a new medication starting today' },
  { method: 'PUT', path: '/api/medications/:id', description: 'Replace medication fields, keeping its start date' },
  { method: 'PATCH', path: '/api/medications/:id', description: 'Update selected medication fields' },
  { method: 'DELETE', path: '/api/medications/:id', description: 'Delete medication and its purchase history' },
  { method: 'PATCH', path: '/api/medications/:id/shopping-list', description: 'Add to or remove from the shopping list' },
  { method: 'POST', path: '/api/medications/:id/purchases', description: 'Append a purchase record' },
  { method: 'GET', path: '/api/shopping-list', description: 'Flagged and low-supply medications' }
];
