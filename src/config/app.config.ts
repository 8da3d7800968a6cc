export interface StoreConfig {
  baseUrl: string;
  apiToken: string;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface ImportConfig {
  maxFileBytes: number;
  maxRows: number;
  defaultUnit: string;
}

export interface AppConfig {
  port: number;
  import: ImportConfig;
  store: StoreConfig;
}

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function readString(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw == null ? fallback : raw.trim();
}

// Runtime configuration, resolved once at startup.

export const APP_CONFIG: AppConfig = {
  port: readInt('PORT', 3000),
  import: {
    maxFileBytes: readInt('IMPORT_MAX_FILE_BYTES', 10 * 1024 * 1024),
    maxRows: readInt('IMPORT_MAX_ROWS', 10000),
    defaultUnit: readString('INVENTORY_DEFAULT_UNIT', 'pcs') || 'pcs',
  },
  store: {
    // Empty means the in-process store is used.
    baseUrl: readString('STORE_BASE_URL', ''),
    apiToken: readString('STORE_API_TOKEN', ''),
    maxRetries: readInt('STORE_MAX_RETRIES', 5),
    retryBaseDelayMs: readInt('STORE_RETRY_BASE_DELAY_MS', 1000),
  },
};
