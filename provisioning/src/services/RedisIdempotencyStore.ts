import type { SetupResult } from "../setup/SetupTypes";
import { getLog } from "../util/Logger";
import type { RedisClientType } from "../util/RedisClient";
import type { IdempotencyRecord, IdempotencyStore, IdempotencyStoreOptions, Reservation } from "./IdempotencyStore";
import { randomUUID } from "node:crypto";
import { z } from "zod";

const log = getLog(import.meta);

export const IDEMPOTENCY_KEY_PREFIX = "setup:idempotency:";

/**
 * Replaces an in-progress record with the completed one if the caller still holds it.
 * A key whose lease expired with nobody taking it over may also be committed.
 *
 * KEYS[1] = record key, ARGV[1] = token, ARGV[2] = completed record, ARGV[3] = retention seconds
 */
export const COMMIT_SCRIPT = `
local current = redis.call("GET", KEYS[1])
if current then
	local record = cjson.decode(current)
	if record.status ~= "in_progress" or record.token ~= ARGV[1] then
		return 0
	end
end
redis.call("SET", KEYS[1], ARGV[2], "EX", tonumber(ARGV[3]))
return 1
`;

/**
 * Rewrites the in-progress record with a fresh lease if the caller still holds it.
 *
 * KEYS[1] = record key, ARGV[1] = token, ARGV[2] = in-progress record, ARGV[3] = lease milliseconds
 */
export const EXTEND_SCRIPT = `
local current = redis.call("GET", KEYS[1])
if not current then
	return 0
end
local record = cjson.decode(current)
if record.status ~= "in_progress" or record.token ~= ARGV[1] then
	return 0
end
redis.call("SET", KEYS[1], ARGV[2], "PX", tonumber(ARGV[3]))
return 1
`;

/**
 * Deletes an in-progress record if the caller still holds it.
 *
 * KEYS[1] = record key, ARGV[1] = token
 */
export const RELEASE_SCRIPT = `
local current = redis.call("GET", KEYS[1])
if not current then
	return 0
end
local record = cjson.decode(current)
if record.status ~= "in_progress" or record.token ~= ARGV[1] then
	return 0
end
redis.call("DEL", KEYS[1])
return 1
`;

const IdempotencyRecordSchema = z.discriminatedUnion("status", [
	z.object({
		status: z.literal("in_progress"),
		requestHash: z.string(),
		token: z.string(),
		expiresAt: z.number(),
	}),
	z.object({
		status: z.literal("completed"),
		requestHash: z.string(),
		result: z.custom<SetupResult>(value => typeof value === "object" && value !== null),
		completedAt: z.string(),
	}),
]);

/**
 * Idempotency store shared across instances through Redis. Reservations use `SET NX PX` so the
 * lease expires on its own; commit and release are compare-and-set scripts on the lease token.
 */
export class RedisIdempotencyStore implements IdempotencyStore {
	private readonly redis: RedisClientType;
	private readonly leaseMs: number;
	private readonly retentionSeconds: number;

	constructor(redis: RedisClientType, options: IdempotencyStoreOptions) {
		this.redis = redis;
		this.leaseMs = options.leaseMs;
		this.retentionSeconds = options.retentionSeconds;
	}

	private redisKey(key: string): string {
		return `${IDEMPOTENCY_KEY_PREFIX}${key}`;
	}

	async lookup(key: string): Promise<IdempotencyRecord | undefined> {
		const raw = await this.redis.get(this.redisKey(key));
		if (raw === null) {
			return;
		}
		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (error) {
			log.warn(error, "Discarding unreadable idempotency record for %s", key);
			return;
		}
		const parsed = IdempotencyRecordSchema.safeParse(json);
		if (!parsed.success) {
			log.warn({ key, issues: parsed.error.issues }, "Discarding malformed idempotency record");
			return;
		}
		return parsed.data;
	}

	async reserve(key: string, requestHash: string): Promise<Reservation | undefined> {
		const token = randomUUID();
		const expiresAt = Date.now() + this.leaseMs;
		const record: IdempotencyRecord = { status: "in_progress", requestHash, token, expiresAt };
		const reply = await this.redis.set(this.redisKey(key), JSON.stringify(record), "PX", this.leaseMs, "NX");
		if (reply !== "OK") {
			return;
		}
		return { key, token, requestHash, expiresAt, leaseMs: this.leaseMs };
	}

	async extend(reservation: Reservation): Promise<boolean> {
		const { key, token, requestHash } = reservation;
		const record: IdempotencyRecord = { status: "in_progress", requestHash, token, expiresAt: Date.now() + this.leaseMs };
		const reply = await this.redis.eval(
			EXTEND_SCRIPT,
			1,
			this.redisKey(key),
			token,
			JSON.stringify(record),
			String(this.leaseMs),
		);
		return reply === 1;
	}

	async commit(reservation: Reservation, result: SetupResult): Promise<boolean> {
		const record: IdempotencyRecord = {
			status: "completed",
			requestHash: reservation.requestHash,
			result,
			completedAt: new Date().toISOString(),
		};
		const reply = await this.redis.eval(
			COMMIT_SCRIPT,
			1,
			this.redisKey(reservation.key),
			reservation.token,
			JSON.stringify(record),
			String(this.retentionSeconds),
		);
		if (reply !== 1) {
			log.warn({ key: reservation.key }, "Reservation lost before commit");
			return false;
		}
		return true;
	}

	async release(reservation: Reservation): Promise<boolean> {
		const reply = await this.redis.eval(RELEASE_SCRIPT, 1, this.redisKey(reservation.key), reservation.token);
		return reply === 1;
	}
}
