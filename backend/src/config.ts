import dotenv from 'dotenv';

dotenv.config();

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : Math.max(0, parsed);
}

/** Reported processing time never drops below this, whatever is configured. */
export const MIN_LATENCY_FLOOR_MS = 100;

export function latencyFloor(requestedMs: number): number {
  return Number.isFinite(requestedMs) ? Math.max(MIN_LATENCY_FLOOR_MS, Math.round(requestedMs)) : MIN_LATENCY_FLOOR_MS;
}

export const config = {
  port: parseNonNegativeInt(process.env.PORT, 5000),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',
  http: {
    bodyLimit: process.env.BODY_LIMIT ?? '1mb',
  },
  analysis: {
    // Mimics model latency; may be raised, never lowered below the floor.
    minLatencyMs: latencyFloor(parseNonNegativeInt(process.env.MIN_LATENCY_MS, MIN_LATENCY_FLOOR_MS)),
    modelUsed: 'ai-mock-v1 (demo) | Production: OpenBioLLM-70B + DeepSeek-R1',
  },
  service: {
    name: 'ai-mock',
    version: '1.0.0',
  },
};

export function isTest(): boolean {
  return config.nodeEnv === 'test';
}
