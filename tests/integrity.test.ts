import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { computeIntegrity, DEFAULT_INTEGRITY_BLOCK_SIZE } from "../src/integrity.js";

const sha256 = (data: Buffer | string) => createHash("sha256").update(data).digest("hex");

describe("computeIntegrity", () => {
	it("hashes the whole entry and each block", () => {
		const integrity = computeIntegrity(Buffer.from("abcdefghij"), 4);

		expect(integrity).toEqual({
			algorithm: "SHA256",
			hash: sha256("abcdefghij"),
			blockSize: 4,
			blocks: [sha256("abcd"), sha256("efgh"), sha256("ij")],
		});
	});

	it("hashes an empty remainder after full blocks", () => {
		const integrity = computeIntegrity(Buffer.from("abcdefgh"), 4);

		expect(integrity.blocks).toEqual([sha256("abcd"), sha256("efgh"), sha256("")]);
	});

	it("hashes a single empty block for empty data", () => {
		const integrity = computeIntegrity(Buffer.alloc(0));

		expect(integrity.blockSize).toBe(DEFAULT_INTEGRITY_BLOCK_SIZE);
		expect(integrity.blocks).toEqual([sha256("")]);
		expect(integrity.hash).toBe(sha256(""));
	});

	it("defaults to 4 MiB blocks", () => {
		expect(DEFAULT_INTEGRITY_BLOCK_SIZE).toBe(4194304);
		expect(computeIntegrity(Buffer.from("small")).blocks).toEqual([sha256("small")]);
	});
});
