import { describe, expect, it } from "vitest";
import {
	decryptData,
	decryptIndexPath,
	decryptIndexSize,
	encryptData,
	encryptIndexPath,
	encryptIndexSize
} from "../../src/pack/crypto.js";

describe("index crypto", () => {
	it("decrypts a size at position 0", () => {
		expect(decryptIndexSize(0x1ef48c6f, 0)).toBe(100);
	});

	it("encrypts sizes back", () => {
		expect(encryptIndexSize(100, 0)).toBe(0x1ef48c6f);
		expect(decryptIndexSize(encryptIndexSize(4096, 17), 17)).toBe(4096);
	});

	it("decrypts a path up to its terminator", () => {
		expect(decryptIndexPath(Buffer.from([0xb8, 0xc0, 0x11, 0x22]), 5)).toEqual({ path: "a", consumed: 2 });
	});

	it("encrypts paths with the terminator", () => {
		expect(encryptIndexPath("a", 5)).toEqual(Buffer.from([0xb8, 0xc0]));
		const encrypted = encryptIndexPath("db/units_tables/data", 0x1234);
		expect(decryptIndexPath(encrypted, 0x1234)).toEqual({ path: "db/units_tables/data", consumed: 21 });
	});

	it("maps each path byte to one character", () => {
		expect(decryptIndexPath(Buffer.from([0x30, 0xc0]), 5)).toEqual({ path: "\u00e9", consumed: 2 });
		expect(encryptIndexPath("\u00e9", 5)).toEqual(Buffer.from([0x30, 0xc0]));
	});
});

describe("data crypto", () => {
	it("decrypts the first block", () => {
		const cipher = Buffer.from([0xf2, 0x6d, 0x59, 0xbf, 0x98, 0xd5, 0x14, 0x70]);
		expect(decryptData(cipher)).toEqual(Buffer.alloc(8));
	});

	it("leaves a trailing partial block alone", () => {
		const plain = Buffer.from("0123456789", "latin1");
		const encrypted = encryptData(plain);
		expect(encrypted.subarray(8)).toEqual(Buffer.from("89", "latin1"));
		expect(decryptData(encrypted)).toEqual(plain);
	});

	it("does not modify its input", () => {
		const input = Buffer.alloc(8);
		decryptData(input);
		expect(input).toEqual(Buffer.alloc(8));
	});
});
