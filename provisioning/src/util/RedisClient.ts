import { getLog } from "./Logger";
import { withTimeout } from "./Timeout";
import Redis from "ioredis";

const log = getLog(import.meta);

export type RedisClientType = Redis;

/**
 * Options for creating a Redis client
 */
export interface RedisClientOptions {
	/** Name for logging purposes (e.g., "idempotency") */
	name: string;
	/** Maximum reconnect attempts before giving up (0 = infinite, default: infinite) */
	maxRetries?: number;
}

/**
 * Default Redis connection options used across all clients.
 */
const DEFAULT_REDIS_OPTIONS = {
	maxRetriesPerRequest: 3,
	enableReadyCheck: true,
	connectTimeout: 5000,
	lazyConnect: false,
	keepAlive: 30000, // Send keep-alive every 30 seconds to prevent idle disconnection
};

/**
 * Creates a Redis client for the given URL. Connection errors are logged, not thrown.
 *
 * @example
 * ```typescript
 * const client = createRedisClient("redis://localhost:6379", { name: "idempotency" });
 * ```
 */
export function createRedisClient(redisUrl: string, options: RedisClientOptions): RedisClientType {
	const { name, maxRetries } = options;

	log.info({ name }, "Connecting to Redis");

	const client = new Redis(redisUrl, {
		...DEFAULT_REDIS_OPTIONS,
		retryStrategy: times => {
			// If maxRetries is set and exceeded, stop retrying
			if (maxRetries !== undefined && maxRetries > 0 && times > maxRetries) {
				log.warn({ name, attempts: times }, "Redis max retries exceeded, giving up");
				return null;
			}
			// Exponential backoff: 50ms, 100ms, 200ms, ... up to 2 seconds
			const delay = Math.min(times * 50, 2000);
			log.info({ name, attempt: times, delayMs: delay }, "Redis reconnecting");
			return delay;
		},
	});

	// Handle Redis errors to prevent unhandled promise rejections
	client.on("error", err => {
		log.warn({ name, err: err.message }, "Redis connection error (non-fatal)");
	});

	client.on("connect", () => {
		log.info({ name }, "Redis connected");
	});

	client.on("close", () => {
		log.debug({ name }, "Redis connection closed");
	});

	return client;
}

/**
 * Tests a Redis connection with a timeout.
 */
export async function testRedisConnection(client: RedisClientType, timeoutMs = 5000): Promise<void> {
	await withTimeout(client.ping(), timeoutMs, "Redis connection timeout");
}

/**
 * Creates a Redis client and verifies the connection. If the connection test
 * fails, the client is disconnected and the error is re-thrown.
 */
export async function connectRedis(redisUrl: string, options: RedisClientOptions): Promise<RedisClientType> {
	const client = createRedisClient(redisUrl, options);
	try {
		await testRedisConnection(client);
		return client;
	} catch (error) {
		client.disconnect();
		throw error;
	}
}
