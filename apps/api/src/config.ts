import { z } from 'zod';

const envSchema = z.object({
  API_PORT: z.coerce.number().int().min(0).max(65_535).default(3200),
  MEMPOOL_DATADIR: z.string().min(1).default('./data'),
});

export type ApiConfig = {
  port: number;
  dataDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${problems}`);
  }
  return { port: parsed.data.API_PORT, dataDir: parsed.data.MEMPOOL_DATADIR };
}
