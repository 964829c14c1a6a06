import type { SetupResult } from "../setup/SetupTypes";
import { getConfig } from "../config/Config";
import { getLog } from "../util/Logger";
import { connectRedis, type RedisClientType } from "../util/RedisClient";
import { MemoryIdempotencyStore } from "./MemoryIdempotencyStore";
import { RedisIdempotencyStore } from "./RedisIdempotencyStore";

const log = getLog(import.meta);

/**
 * Ownership of an idempotency key for one execution. Only the holder of the token may commit or release.
 */
export interface Reservation {
	key: string;
	token: string;
	requestHash: string;
	/** Epoch milliseconds after which another caller may take the key over */
	expiresAt: number;
	/** How far each reservation or renewal pushes `expiresAt` out */
	leaseMs: number;
}

export type IdempotencyRecord =
	| { status: "in_progress"; requestHash: string; token: string; expiresAt: number }
	| { status: "completed"; requestHash: string; result: SetupResult; completedAt: string };

/**
 * Store backing idempotent setups. Reservations are atomic: of several concurrent `reserve`
 * calls for one key, at most one gets a Reservation.
 */
export interface IdempotencyStore {
	/**
	 * The live record for a key. Expired reservations read as absent.
	 */
	lookup(key: string): Promise<IdempotencyRecord | undefined>;
	/**
	 * Take ownership of a key. Returns undefined when the key is reserved by someone else or already completed.
	 */
	reserve(key: string, requestHash: string): Promise<Reservation | undefined>;
	/**
	 * Renew a live lease for another `leaseMs`. Returns false once the lease has lapsed, was
	 * released or taken over, or the key is completed.
	 */
	extend(reservation: Reservation): Promise<boolean>;
	/**
	 * Store the result for replay. Returns false when the reservation was lost to another caller.
	 */
	commit(reservation: Reservation, result: SetupResult): Promise<boolean>;
	/**
	 * Give the key up without a result so a later call may run again.
	 */
	release(reservation: Reservation): Promise<boolean>;
}

export interface IdempotencyStoreOptions {
	/** How long a reservation is honoured */
	leaseMs: number;
	/** How long completed results are kept */
	retentionSeconds: number;
}

export type IdempotencyStoreType = "redis" | "memory";

let store: IdempotencyStore | null = null;
let storeType: IdempotencyStoreType = "memory";
let redisClient: RedisClientType | null = null;

/**
 * Initialize the idempotency store: Redis when REDIS_URL is set and reachable, otherwise in memory.
 */
export async function initIdempotencyStore(): Promise<{ store: IdempotencyStore; type: IdempotencyStoreType }> {
	if (store) {
		return { store, type: storeType };
	}

	const config = getConfig();
	const options: IdempotencyStoreOptions = {
		leaseMs: config.SETUP_IDEMPOTENCY_LEASE_MS,
		retentionSeconds: config.SETUP_IDEMPOTENCY_RETENTION_SECONDS,
	};

	if (config.REDIS_URL) {
		try {
			log.info("Attempting to connect to Redis...");
			redisClient = await connectRedis(config.REDIS_URL, { name: "idempotency", maxRetries: 3 });
			store = new RedisIdempotencyStore(redisClient, options);
			storeType = "redis";
			log.info("Using Redis for idempotency records");
			return { store, type: storeType };
		} catch (error) {
			log.warn(error, "Failed to connect to Redis, falling back to in-memory idempotency records");
			redisClient = null;
		}
	} else {
		log.info("REDIS_URL not configured, using in-memory idempotency records");
	}

	store = new MemoryIdempotencyStore(options);
	storeType = "memory";
	log.info("Using in-memory idempotency records (not safe across multiple instances)");
	return { store, type: storeType };
}

export function getIdempotencyStoreType(): IdempotencyStoreType {
	return storeType;
}

/**
 * Close the Redis connection, if any
 */
export async function closeIdempotencyStore(): Promise<void> {
	if (redisClient) {
		await redisClient.quit();
		redisClient = null;
		log.info("Idempotency store connection closed");
	}
	if (store instanceof MemoryIdempotencyStore) {
		store.close();
	}
	store = null;
	storeType = "memory";
}

/**
 * Reset the store (for testing)
 */
export function resetIdempotencyStore(): void {
	if (store instanceof MemoryIdempotencyStore) {
		store.close();
	}
	store = null;
	storeType = "memory";
	redisClient = null;
}
