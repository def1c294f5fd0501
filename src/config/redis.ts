/**
 * Redis client for BullMQ
 */

import { Redis } from "ioredis";
import { REDIS_URL } from "./env.js";

// Parse the Redis URL to extract connection details
const redisUrl = new URL(REDIS_URL);

export const redis = new Redis({
  host: redisUrl.hostname,
  port: parseInt(redisUrl.port || "6379", 10),
  password: redisUrl.password || undefined,
  username: redisUrl.username || undefined,

  // BullMQ requirements
  maxRetriesPerRequest: null,
  enableReadyCheck: false,

  connectTimeout: 60000,
  keepAlive: 30000,
  family: 4,

  // rediss:// means a TLS endpoint (managed Redis)
  tls: redisUrl.protocol === "rediss:" ? { rejectUnauthorized: true } : undefined,

  retryStrategy: (times: number) => {
    if (times > 20) {
      console.error(`[Redis] Failed to connect after ${times} attempts`);
      return null;
    }
    const delay = Math.min(times * 500, 5000);
    console.log(`[Redis] Retry attempt ${times}, waiting ${delay}ms`);
    return delay;
  },

  reconnectOnError: (err) => err.message.includes("READONLY"),
});

redis.on("error", (err) => {
  console.error("[Redis] Connection error:", err.message);
});

redis.on("connect", () => {
  console.log("[Redis] Connected successfully");
});

redis.on("ready", () => {
  console.log("[Redis] Ready to accept commands");
});
