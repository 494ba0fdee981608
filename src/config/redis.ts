import { Logger } from "@nestjs/common";
import { Redis as IoRedis } from "ioredis";

const logger = new Logger("RedisClient");

/**
 * Create the snapshot cache client. The connection is opened on first use,
 * so processes that never touch the cache never connect.
 */
export function createRedisClient(url: string): IoRedis {
  const client = new IoRedis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });

  client.on("error", (error: Error) => {
    logger.error(`Redis connection error: ${error.message}`);
  });

  return client;
}
