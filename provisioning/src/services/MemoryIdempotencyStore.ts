import type { SetupResult } from "../setup/SetupTypes";
import { getLog } from "../util/Logger";
import type { IdempotencyRecord, IdempotencyStore, IdempotencyStoreOptions, Reservation } from "./IdempotencyStore";
import { randomUUID } from "node:crypto";

const log = getLog(import.meta);

interface MemoryEntry {
	record: IdempotencyRecord;
	expiresAt: number; // Unix timestamp in milliseconds
}

/**
 * In-process idempotency store with lease and retention expiry.
 * This is a fallback for when Redis is not available.
 *
 * Note: This store is NOT suitable for production multi-instance deployments
 * as reservations are not shared between instances. Use Redis for production.
 */
export class MemoryIdempotencyStore implements IdempotencyStore {
	private entries: Map<string, MemoryEntry> = new Map();
	private cleanupInterval: ReturnType<typeof setInterval> | null = null;
	private readonly leaseMs: number;
	private readonly retentionMs: number;
	private readonly now: () => number;

	constructor(options: IdempotencyStoreOptions, now: () => number = Date.now) {
		this.leaseMs = options.leaseMs;
		this.retentionMs = options.retentionSeconds * 1000;
		this.now = now;
		// Run cleanup every 60 seconds to remove expired entries
		this.cleanupInterval = setInterval(() => this.cleanup(), 60_000);
		// Don't block process exit
		this.cleanupInterval.unref();
	}

	private live(key: string): MemoryEntry | undefined {
		const entry = this.entries.get(key);
		if (!entry) {
			return;
		}
		if (this.now() >= entry.expiresAt) {
			this.entries.delete(key);
			return;
		}
		return entry;
	}

	private holds(reservation: Reservation): boolean {
		const entry = this.live(reservation.key);
		return entry?.record.status === "in_progress" && entry.record.token === reservation.token;
	}

	lookup(key: string): Promise<IdempotencyRecord | undefined> {
		const entry = this.live(key);
		return Promise.resolve(entry ? structuredClone(entry.record) : undefined);
	}

	reserve(key: string, requestHash: string): Promise<Reservation | undefined> {
		if (this.live(key)) {
			return Promise.resolve(undefined);
		}
		const expiresAt = this.now() + this.leaseMs;
		const token = randomUUID();
		this.entries.set(key, { record: { status: "in_progress", requestHash, token, expiresAt }, expiresAt });
		return Promise.resolve({ key, token, requestHash, expiresAt, leaseMs: this.leaseMs });
	}

	extend(reservation: Reservation): Promise<boolean> {
		if (!this.holds(reservation)) {
			return Promise.resolve(false);
		}
		const expiresAt = this.now() + this.leaseMs;
		const { key, token, requestHash } = reservation;
		this.entries.set(key, { record: { status: "in_progress", requestHash, token, expiresAt }, expiresAt });
		return Promise.resolve(true);
	}

	commit(reservation: Reservation, result: SetupResult): Promise<boolean> {
		// An expired lease may still commit as long as nobody else has taken the key
		if (this.live(reservation.key) && !this.holds(reservation)) {
			log.warn({ key: reservation.key }, "Reservation lost before commit");
			return Promise.resolve(false);
		}
		const now = this.now();
		this.entries.set(reservation.key, {
			record: {
				status: "completed",
				requestHash: reservation.requestHash,
				result: structuredClone(result),
				completedAt: new Date(now).toISOString(),
			},
			expiresAt: now + this.retentionMs,
		});
		return Promise.resolve(true);
	}

	release(reservation: Reservation): Promise<boolean> {
		if (!this.holds(reservation)) {
			return Promise.resolve(false);
		}
		this.entries.delete(reservation.key);
		return Promise.resolve(true);
	}

	/**
	 * Remove expired entries
	 */
	private cleanup(): void {
		const now = this.now();
		let cleaned = 0;
		for (const [key, entry] of this.entries) {
			if (now >= entry.expiresAt) {
				this.entries.delete(key);
				cleaned++;
			}
		}
		if (cleaned > 0) {
			log.debug("MemoryIdempotencyStore cleanup: removed %d expired entries", cleaned);
		}
	}

	/**
	 * Get the number of stored entries (for debugging)
	 */
	size(): number {
		return this.entries.size;
	}

	/**
	 * Stop the cleanup interval
	 */
	close(): void {
		if (this.cleanupInterval) {
			clearInterval(this.cleanupInterval);
			this.cleanupInterval = null;
		}
		this.entries.clear();
	}
}
