import { canonicalJson, isPlainRecord, memoized, sortKeysDeep } from "./ObjectUtils";
import { describe, expect, it, vi } from "vitest";

describe("ObjectUtils", () => {
	describe("memoized", () => {
		it("should create the object once", () => {
			const factory = vi.fn(() => ({ id: 1 }));
			const get = memoized(factory);

			expect(get()).toBe(get());
			expect(factory).toHaveBeenCalledTimes(1);
		});
	});

	describe("isPlainRecord", () => {
		it("should accept objects only", () => {
			expect(isPlainRecord({ a: 1 })).toBe(true);
			expect(isPlainRecord([])).toBe(false);
			expect(isPlainRecord(null)).toBe(false);
			expect(isPlainRecord("a")).toBe(false);
		});
	});

	describe("sortKeysDeep", () => {
		it("should sort nested keys and keep array order", () => {
			const result = sortKeysDeep({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 3 } });

			expect(JSON.stringify(result)).toBe('{"a":{"c":3,"d":[{"y":2,"z":1}]},"b":1}');
		});

		it("should drop undefined values", () => {
			expect(sortKeysDeep({ a: undefined, b: null })).toEqual({ b: null });
		});
	});

	describe("canonicalJson", () => {
		it("should render equal objects identically regardless of key order", () => {
			expect(canonicalJson({ name: "Acme", settings: { tier: "pro", region: "eu" } })).toBe(
				canonicalJson({ settings: { region: "eu", tier: "pro" }, name: "Acme" }),
			);
		});
	});
});
