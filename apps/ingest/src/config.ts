import { z } from 'zod';

const envSchema = z.object({
  MEMPOOL_DATADIR: z.string().min(1).default('./data'),
  SOURCE_BASE_URL: z.string().url().default('https://mempool-dumpster.flashbots.net/ethereum/mainnet'),
  SOURCE_INDEX_URL: z.string().url().default('https://mempool-dumpster.flashbots.net/index.html'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ROW_GROUP_SIZE: z.coerce.number().int().positive().default(10_000),
  INGEST_METRICS_PORT: z.coerce.number().int().positive().optional(),
});

export type IngestConfig = {
  dataDir: string;
  sourceBaseUrl: string;
  sourceIndexUrl: string;
  fetchTimeoutMs: number;
  rowGroupSize: number;
  metricsPort: number | undefined;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${problems}`);
  }
  const cfg = parsed.data;
  return {
    dataDir: cfg.MEMPOOL_DATADIR,
    sourceBaseUrl: cfg.SOURCE_BASE_URL,
    sourceIndexUrl: cfg.SOURCE_INDEX_URL,
    fetchTimeoutMs: cfg.FETCH_TIMEOUT_MS,
    rowGroupSize: cfg.ROW_GROUP_SIZE,
    metricsPort: cfg.INGEST_METRICS_PORT,
  };
}
