import { describe, expect, it } from "vitest";
import { CompressionError } from "../../src/errors.js";
import { compressData, decompressData, detectCompressionFormat } from "../../src/pack/compression.js";

const sample = Buffer.from("unit_key;cost;upkeep\n".repeat(64), "utf8");

describe("compression", () => {
	it("prefixes the uncompressed size", () => {
		const compressed = compressData(sample, "zstd");
		expect(compressed.readUInt32LE(0)).toBe(sample.length);
		expect(detectCompressionFormat(compressed)).toBe("zstd");
	});

	it.each(["zstd", "lz4"] as const)("survives repeated %s cycles", (format) => {
		const first = compressData(sample, format);
		let data: Buffer = sample;
		for (let cycle = 0; cycle < 3; cycle++) {
			const compressed = compressData(data, format);
			expect(detectCompressionFormat(compressed)).toBe(format);
			expect(compressed).toEqual(first);
			data = decompressData(compressed);
			expect(data).toEqual(sample);
		}
	});

	it("recognises but refuses LZMA1 streams", () => {
		const lzma = Buffer.from([16, 0, 0, 0, 0x5d, 0x00, 0x00, 0x40, 0x00]);
		expect(detectCompressionFormat(lzma)).toBe("lzma1");
		expect(() => decompressData(lzma)).toThrow(CompressionError);
		expect(() => compressData(sample, "lzma1")).toThrow(CompressionError);
	});

	it("rejects data too short for a frame", () => {
		expect(() => detectCompressionFormat(Buffer.from([1, 0, 0, 0]))).toThrow(CompressionError);
	});

	it("checks the decompressed size", () => {
		const compressed = compressData(sample, "zstd");
		compressed.writeUInt32LE(sample.length + 1, 0);
		expect(() => decompressData(compressed)).toThrow(`Decompressed ${sample.length} bytes, header says ${sample.length + 1}`);
	});
});
