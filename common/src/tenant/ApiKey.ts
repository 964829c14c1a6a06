/** Who an API key acts for */
export type ApiKeyScope = "organization" | "tenant" | "user";

export type ApiKeyEnvironment = "test" | "live";

/**
 * Options sent when generating an API key.
 */
export interface ApiKeyOptions {
	scope: ApiKeyScope;
	autoRotate: boolean;
	/** Days before the key is rotated (or expires when rotation is off) */
	maxKeyAgeDays: number;
	/** Hours the previous key stays valid after a rotation */
	gracePeriodHours: number;
	environment: ApiKeyEnvironment;
}

export interface ApiKey {
	id: string;
	userId: string;
	/** Secret value. Only returned when the key is generated. */
	key: string;
	scope: ApiKeyScope;
	expiresAt: string | null;
	createdAt: string;
}
