// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Redis-Integration (ioredis v5)
// - ausschließlich als geteilter Store für @fastify/rate-limit
// - optional: ohne REDIS_URL zählt jede Instanz lokal
// ============================================================================
import { Redis } from "ioredis";

export type RedisClient = Redis;

export function createRedis(url: string): RedisClient {
  const client = new Redis(url, {
    lazyConnect: true,
    enableReadyCheck: true,
    maxRetriesPerRequest: 1,
    // Rate-Limit darf Requests nicht blockieren, wenn Redis weg ist
    enableOfflineQueue: false,
    connectTimeout: 2_000,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  return client;
}

export async function ensureRedis(client: RedisClient): Promise<void> {
  if (client.status === "wait" || client.status === "end") {
    await client.connect();
  }
  await client.ping();
}

export async function redisHealth(client: RedisClient): Promise<{ ok: boolean; mode: string }> {
  try {
    const pong = await client.ping();
    return { ok: pong === "PONG", mode: client.status };
  } catch {
    return { ok: false, mode: client.status };
  }
}

export async function quitRedis(client: RedisClient): Promise<void> {
  try {
    await client.quit();
  } catch {
    client.disconnect();
  }
}
