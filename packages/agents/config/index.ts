// Runtime configuration, read from environment variables and validated with zod

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { AgentName } from '../types/agents.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-5';

const intFrom = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  CIM_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  CIM_MODEL_FINANCIAL: z.string().min(1).optional(),
  CIM_MODEL_RISK: z.string().min(1).optional(),
  CIM_MODEL_CONSISTENCY: z.string().min(1).optional(),
  CIM_MODEL_MEMO: z.string().min(1).optional(),
  CIM_MODEL_QUOTE: z.string().min(1).optional(),
  CIM_MODEL_CHART: z.string().min(1).optional(),
  CIM_MODEL_TIMEOUT_MS: intFrom(60_000, 1),
  CIM_MODEL_MAX_RETRIES: intFrom(2, 0),
  CIM_MODEL_RETRY_DELAY_MS: intFrom(1_000, 0),
  CIM_MAX_TOKENS: intFrom(3_000, 1),
  CIM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),
  CIM_CHUNK_MAX_CHARS: intFrom(4_000, 200),
  CIM_HEADER_MAX_CHARS: intFrom(80, 1),
  CIM_STORE_BACKEND: z.enum(['local', 'postgres', 'pg']).default('local'),
  PG_HOST: z.string().default('localhost'),
  PG_PORT: intFrom(5432, 1),
  PG_USER: z.string().default('cim'),
  PG_PASSWORD: z.string().default(''),
  PG_DATABASE: z.string().default('cim_analyst'),
  PG_POOL_MAX: intFrom(10, 1),
});

export type StoreBackend = 'local' | 'postgres';

export interface ModelSettings {
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxTokens: number;
  temperature: number;
}

export interface CimConfig {
  /** Model identifier per agent, after CIM_MODEL_<AGENT> overrides */
  models: Record<AgentName, string>;
  model: ModelSettings;
  chunking: { maxChars: number; headerMaxChars: number };
  store: {
    backend: StoreBackend;
    pg: { host: string; port: number; user: string; password: string; database: string; poolMax: number };
  };
}

/** Treat empty strings as unset, the way an empty line in .env reads */
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CimConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    models: {
      financial: e.CIM_MODEL_FINANCIAL ?? e.CIM_MODEL,
      risk: e.CIM_MODEL_RISK ?? e.CIM_MODEL,
      consistency: e.CIM_MODEL_CONSISTENCY ?? e.CIM_MODEL,
      memo: e.CIM_MODEL_MEMO ?? e.CIM_MODEL,
      quote: e.CIM_MODEL_QUOTE ?? e.CIM_MODEL,
      chart: e.CIM_MODEL_CHART ?? e.CIM_MODEL,
    },
    model: {
      apiKey: e.ANTHROPIC_API_KEY,
      timeoutMs: e.CIM_MODEL_TIMEOUT_MS,
      maxRetries: e.CIM_MODEL_MAX_RETRIES,
      retryDelayMs: e.CIM_MODEL_RETRY_DELAY_MS,
      maxTokens: e.CIM_MAX_TOKENS,
      temperature: e.CIM_TEMPERATURE,
    },
    chunking: {
      maxChars: e.CIM_CHUNK_MAX_CHARS,
      headerMaxChars: e.CIM_HEADER_MAX_CHARS,
    },
    store: {
      backend: e.CIM_STORE_BACKEND === 'local' ? 'local' : 'postgres',
      pg: {
        host: e.PG_HOST,
        port: e.PG_PORT,
        user: e.PG_USER,
        password: e.PG_PASSWORD,
        database: e.PG_DATABASE,
        poolMax: e.PG_POOL_MAX,
      },
    },
  };
}
