import { createEnv } from "@t3-oss/env-core";
import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

// Load .env first (defaults), then .env.local (local overrides take precedence)
dotenvConfig({ path: ".env" });
dotenvConfig({ path: ".env.local", override: true });

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

/**
 * Configuration schema definition
 */
const configSchema = {
	server: {
		// Base URL of the checkout platform's provisioning API
		CHECKOUT_API_URL: z.string().url().default("http://localhost:8080"),
		// Platform token sent as a bearer token with every provisioning call
		CHECKOUT_API_TOKEN: z.string().optional(),
		// When set, idempotency records are kept in Redis; otherwise in process memory
		REDIS_URL: z.string().optional(),
		// Parent domain for tenants without a custom domain: <subdomain>.<SETUP_BASE_DOMAIN>
		SETUP_BASE_DOMAIN: z.string().default("checkout.localhost"),
		// Attempts per step for transient failures, including the first
		SETUP_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
		SETUP_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
		SETUP_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60000),
		SETUP_RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
		// Jitter as a fraction of the delay (0.1 = up to 10% extra)
		SETUP_RETRY_JITTER_FACTOR: z.coerce.number().min(0).max(1).default(0.1),
		// Upper bound for a single provisioning call
		SETUP_STEP_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
		// How long a reservation blocks other callers before it may be taken over (default: 5 minutes)
		SETUP_IDEMPOTENCY_LEASE_MS: z.coerce.number().int().min(1).default(300000),
		// How long completed results are kept for replay (default: 24 hours)
		SETUP_IDEMPOTENCY_RETENTION_SECONDS: z.coerce.number().int().min(1).default(86400),
		// Time bucket for derived idempotency keys (default: 1 hour)
		SETUP_IDEMPOTENCY_WINDOW_MS: z.coerce.number().int().min(1).default(3600000),
		// Attempts per compensating action during rollback
		SETUP_ROLLBACK_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
		SETUP_ROLLBACK_DELAY_MS: z.coerce.number().int().min(0).default(5000),
		API_KEY_SCOPE: z.enum(["organization", "tenant", "user"]).default("organization"),
		API_KEY_AUTO_ROTATE: BooleanSchema.default("true"),
		API_KEY_MAX_AGE_DAYS: z.coerce.number().int().min(1).default(90),
		API_KEY_GRACE_PERIOD_HOURS: z.coerce.number().int().min(0).default(24),
		API_KEY_ENVIRONMENT: z.enum(["test", "live"]).default("test"),
		NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
	},
	/**
	 * What object holds the environment variables at runtime.
	 */
	runtimeEnv: process.env,
	/**
	 * Treat `PORT=` style empty values as unset so defaults apply.
	 */
	emptyStringAsUndefined: true,
};

/**
 * Creates a new configuration object from the current environment
 */
function createConfig() {
	return createEnv(configSchema);
}

export type Config = ReturnType<typeof createConfig>;

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object, creating it from the environment on first use.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the configuration cache, forcing it to be recreated on the next call to getConfig().
 * This is primarily useful for testing when environment variables change between tests.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
