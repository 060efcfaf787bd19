import type { RedisOptions } from "ioredis";

/**
 * Uses hyphen-only queue names because BullMQ uses colon as an internal Redis key separator.
 */
export const queueNames = {
  historyIngest: "history-ingest",
} as const;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    // BullMQ workers block on Redis and require this to be null.
    maxRetriesPerRequest: null,
  };
};
