import { z } from 'zod';
import pino, { type Logger } from 'pino';
import 'dotenv/config';

// ─── Errors ───────────────────────────────────────────────────────────
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ─── Environment Schema ───────────────────────────────────────────────
const hostListFromEnv = z.preprocess((value) => {
  if (typeof value === 'string') {
    return value.trim().split(/\s+/).filter((host) => host.length > 0);
  }
  return value;
}, z.array(z.string().min(1)).min(1));

const envSchema = z.object({
  // Cluster
  SIFT_HOSTS: hostListFromEnv.default(['localhost:9200']),
  SIFT_TIMEOUT: z.coerce.number().positive().optional(),

  // Application
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

// ─── Parse & Validate ─────────────────────────────────────────────────
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new ConfigurationError('Invalid environment configuration');
  }
  return parsed.data;
}

export const env = loadEnv();

// ─── Cluster Settings ────────────────────────────────────────────────
export interface ClusterSettings {
  /** Hosts of the search cluster, with or without scheme and port */
  hosts: string[];
  /** Request timeout in seconds */
  timeout?: number;
}

const clusterSettingsSchema = z.object({
  hosts: z.array(z.string().min(1)).min(1),
  timeout: z.number().positive().optional(),
});

function definedOverrides(overrides: Partial<ClusterSettings>): Partial<ClusterSettings> {
  const result: Partial<ClusterSettings> = {};
  if (overrides.hosts !== undefined) result.hosts = overrides.hosts;
  if (overrides.timeout !== undefined) result.timeout = overrides.timeout;
  return result;
}

function validateSettings(candidate: ClusterSettings): ClusterSettings {
  const parsed = clusterSettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new ConfigurationError(`Invalid cluster settings: ${fields}`);
  }
  return parsed.data;
}

/**
 * Cluster settings resolved from the environment, with explicit overrides
 * taking precedence. `configure` merges further overrides later on.
 *
 * @example
 * ```ts
 * settings.configure({ hosts: ['http://search-1:9200'], timeout: 30 });
 * ```
 */
export class Settings {
  private values: ClusterSettings;

  constructor(overrides: Partial<ClusterSettings> = {}, source: NodeJS.ProcessEnv = process.env) {
    const fromEnv = loadEnv(source);
    this.values = validateSettings({
      hosts: fromEnv.SIFT_HOSTS,
      timeout: fromEnv.SIFT_TIMEOUT,
      ...definedOverrides(overrides),
    });
  }

  configure(overrides: Partial<ClusterSettings>): this {
    this.values = validateSettings({ ...this.values, ...definedOverrides(overrides) });
    return this;
  }

  get<K extends keyof ClusterSettings>(key: K): ClusterSettings[K] {
    return this.values[key];
  }

  snapshot(): Readonly<ClusterSettings> {
    return Object.freeze({ ...this.values, hosts: [...this.values.hosts] });
  }
}

export const settings = new Settings();

// ─── Structured Logger Factory ───────────────────────────────────────
export function createLogger(name: string): Logger {
  return pino({
    name,
    level: env.LOG_LEVEL,
    ...(env.NODE_ENV === 'development' && {
      transport: { target: 'pino/file', options: { destination: 1 } },
      formatters: { level: (label: string) => ({ level: label }) },
    }),
  });
}
