import { registerAs } from '@nestjs/config';

export const ENV_PORT = 'PORT';
export const ENV_REGEX_MODE = 'CATALOG_REGEX_MODE';
export const ENV_DEFAULT_LIMIT = 'CATALOG_DEFAULT_LIMIT';
export const ENV_MAX_LIMIT = 'CATALOG_MAX_LIMIT';
export const ENV_COMPARE_MAX = 'CATALOG_COMPARE_MAX';
export const ENV_CORS_ORIGINS = 'CORS_ORIGINS';

/**
 * How user-supplied strings become regex fragments.
 * - `raw`: passed through unescaped; metacharacters keep their meaning.
 * - `escaped`: metacharacters are escaped so the input matches literally.
 */
export type RegexMode = 'raw' | 'escaped';

export interface CatalogConfig {
  readonly port: number;
  readonly regexMode: RegexMode;
  /** Page size used when a request gives none. */
  readonly defaultLimit: number;
  /** Upper bound for any requested page size. */
  readonly maxLimit: number;
  /** How many ids the compare endpoint honours. */
  readonly compareMax: number;
  /** Allowed CORS origins; `*` allows every origin. */
  readonly corsOrigins: ReadonlyArray<string>;
}

export const CATALOG_DEFAULTS: Readonly<CatalogConfig> = {
  port: 8000,
  regexMode: 'raw',
  defaultLimit: 20,
  maxLimit: 100,
  compareMax: 4,
  corsOrigins: ['*'],
};

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function parseRegexMode(value: string | undefined): RegexMode {
  const v = (value ?? '').trim().toLowerCase();
  return v === 'escaped' ? 'escaped' : CATALOG_DEFAULTS.regexMode;
}

function parseOrigins(value: string | undefined): ReadonlyArray<string> {
  const list = (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return list.length > 0 ? list : CATALOG_DEFAULTS.corsOrigins;
}

/**
 * Load catalog settings from an env map. Never throws.
 * A default limit above the cap is lowered to the cap.
 */
export function loadCatalogConfig(
  env: NodeJS.ProcessEnv = process.env,
): CatalogConfig {
  const maxLimit = parsePositiveInt(
    env[ENV_MAX_LIMIT],
    CATALOG_DEFAULTS.maxLimit,
  );
  const defaultLimit = Math.min(
    parsePositiveInt(env[ENV_DEFAULT_LIMIT], CATALOG_DEFAULTS.defaultLimit),
    maxLimit,
  );
  return {
    port: parsePositiveInt(env[ENV_PORT], CATALOG_DEFAULTS.port),
    regexMode: parseRegexMode(env[ENV_REGEX_MODE]),
    defaultLimit,
    maxLimit,
    compareMax: parsePositiveInt(
      env[ENV_COMPARE_MAX],
      CATALOG_DEFAULTS.compareMax,
    ),
    corsOrigins: parseOrigins(env[ENV_CORS_ORIGINS]),
  };
}

/** `catalog` config namespace for ConfigModule. */
export const catalogConfig = registerAs('catalog', (): CatalogConfig =>
  loadCatalogConfig(),
);
