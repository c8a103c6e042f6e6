const DEFAULT_PORT = 3000;
const DEFAULT_LOW_SUPPLY_THRESHOLD_DAYS = 7;

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseOrigins(value: string | undefined): string[] | '*' {
  if (!value || value.trim() === '*') {
    return '*';
  }
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : '*';
}

export interface AppConfig {
  port: number;
  corsOrigins: string[] | '*';
  lowSupplyThresholdDays: number;
  debugSql: boolean;
}

export function getAppConfig(): AppConfig {
  return {
    port: parseInteger(process.env.PORT, DEFAULT_PORT),
    corsOrigins: parseOrigins(process.env.CORS_ORIGINS),
    lowSupplyThresholdDays: Math.max(
      0,
      parseInteger(process.env.LOW_SUPPLY_THRESHOLD_DAYS, DEFAULT_LOW_SUPPLY_THRESHOLD_DAYS)
    ),
    debugSql: (process.env.DEBUG_SQL ?? '').toLowerCase().trim() === 'true'
  };
}
