import { createHash } from "node:crypto";
import slugify from "slugify";

/**
 * Longest DNS label. Subdomains must fit in one label.
 */
export const MAX_SUBDOMAIN_LENGTH = 63;

const SUBDOMAIN_REGEX = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * Generate a DNS-safe slug from text.
 * Text with nothing transliterable (e.g. only CJK characters) gets a stable hash-based slug,
 * so the same name always yields the same slug.
 *
 * @example
 * generateSlug("Acme Corp") // "acme-corp"
 */
export function generateSlug(text: string, maxLength = MAX_SUBDOMAIN_LENGTH): string {
	let slug = slugify(text, {
		lower: true,
		strict: true,
		trim: true,
	});

	if (!slug) {
		slug = `org-${createHash("sha256").update(text).digest("hex").slice(0, 8)}`;
	}

	return slug.substring(0, maxLength).replace(/-+$/, "");
}

/**
 * Whether the value is usable as a subdomain label: lowercase letters, digits and inner hyphens, 1-63 characters.
 */
export function isValidSubdomain(value: string): boolean {
	return SUBDOMAIN_REGEX.test(value);
}

/**
 * Whether the value is a fully-qualified host name of at least two labels, e.g. "shop.acme.test".
 */
export function isValidDomain(value: string): boolean {
	const labels = value.toLowerCase().split(".");
	return value.length <= 253 && labels.length >= 2 && labels.every(label => SUBDOMAIN_REGEX.test(label));
}
