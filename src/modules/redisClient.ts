import Redis from "ioredis";
import type { IngestConfig } from "./config";
import { BrokerUnavailableError, describeError } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("redis");

// Reconnect attempts before the client gives up and commands start failing
const MAX_RECONNECT_ATTEMPTS = 5;
const RECONNECT_DELAY_MS = 500;
const COMMAND_TIMEOUT_MS = 10000;

/**
 * Creates an unconnected Redis client for the broker.
 * Commands issued while disconnected fail instead of queueing.
 * @param broker Broker section of the ingest configuration
 */
export function createRedisClient(broker: IngestConfig["broker"]): Redis {
  logger.info(`Redis target: redis://${broker.host}:${broker.port}/${broker.db}`);

  const redis = new Redis({
    host: broker.host,
    port: broker.port,
    db: broker.db,
    password: broker.password ?? undefined,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    commandTimeout: COMMAND_TIMEOUT_MS,
    retryStrategy: (times) => {
      if (times > MAX_RECONNECT_ATTEMPTS) {
        logger.error("Redis max reconnect attempts reached");
        return null;
      }
      const delay = Math.min(times * RECONNECT_DELAY_MS, 5000);
      logger.warn(`Redis reconnect attempt ${times}, waiting ${delay}ms`);
      return delay;
    },
  });

  redis.on("ready", () => {
    logger.info("Redis client ready");
  });

  redis.on("error", (error) => {
    logger.error(`Redis client error: ${error}`);
  });

  redis.on("end", () => {
    logger.warn("Redis connection closed");
  });

  return redis;
}

/**
 * Runs a broker command, converting any failure into a BrokerUnavailableError
 * @param operation Name of the operation for the error message
 * @param command Broker command
 */
export async function brokerCall<T>(
  operation: string,
  command: () => Promise<T>
): Promise<T> {
  try {
    return await command();
  } catch (error) {
    if (error instanceof BrokerUnavailableError) {
      throw error;
    }
    throw new BrokerUnavailableError(
      `Broker ${operation} failed: ${describeError(error)}`,
      error
    );
  }
}

/**
 * Connects the client and checks the broker answers
 * @throws BrokerUnavailableError if the broker cannot be reached
 */
export async function connectBroker(redis: Redis): Promise<void> {
  await brokerCall("connect", async () => {
    if (redis.status === "wait" || redis.status === "end") {
      await redis.connect();
    }
    await redis.ping();
  });
}
