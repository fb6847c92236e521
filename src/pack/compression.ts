/**
 * Kompression für Pack-Einträge.
 * Format: [u32 unkomprimierte Größe][Frame]. Der Frame-Typ wird an der Magic erkannt:
 * Zstd (28 B5 2F FD) und LZ4-Frame (04 22 4D 18). LZMA1-Streams werden nicht unterstützt.
 */

import { decompress as decompressZstd } from "fzstd";
import { createRequire } from "node:module";
import { CompressionError } from "../errors.js";

interface Lz4Module {
	encode(input: Buffer): Buffer;
	decode(input: Buffer): Buffer;
}

interface ZstdModule {
	compress(input: Uint8Array): Buffer;
}

const require = createRequire(import.meta.url);
const lz4: Lz4Module = require("lz4");
const zstdNapi: ZstdModule = require("zstd-napi");

export type CompressionFormat = "zstd" | "lz4" | "lzma1";

const ZSTD_MAGIC = Buffer.from([0x28, 0xb5, 0x2f, 0xfd]);
const LZ4_MAGIC = Buffer.from([0x04, 0x22, 0x4d, 0x18]);
const SIZE_PREFIX = 4;

export const DEFAULT_COMPRESSION_FORMAT: CompressionFormat = "zstd";

/** Frame type of a compressed entry (the u32 size prefix included). */
export function detectCompressionFormat(data: Buffer): CompressionFormat {
	if (data.length < SIZE_PREFIX + 4) {
		throw new CompressionError(`Compressed data too short: ${data.length} bytes`);
	}
	const magic = data.subarray(SIZE_PREFIX, SIZE_PREFIX + 4);
	if (magic.equals(ZSTD_MAGIC)) return "zstd";
	if (magic.equals(LZ4_MAGIC)) return "lz4";
	return "lzma1";
}

export function compressData(data: Buffer, format: CompressionFormat = DEFAULT_COMPRESSION_FORMAT): Buffer {
	let frame: Buffer;
	switch (format) {
		case "zstd": {
			const out = zstdNapi.compress(data);
			frame = Buffer.isBuffer(out) ? out : Buffer.from(out);
			break;
		}
		case "lz4":
			frame = lz4.encode(data);
			break;
		case "lzma1":
			throw new CompressionError("LZMA1 compression is not supported");
	}
	const prefix = Buffer.alloc(SIZE_PREFIX);
	prefix.writeUInt32LE(data.length, 0);
	return Buffer.concat([prefix, frame]);
}

export function decompressData(data: Buffer): Buffer {
	const format = detectCompressionFormat(data);
	const expected = data.readUInt32LE(0);
	const frame = data.subarray(SIZE_PREFIX);

	let out: Buffer;
	switch (format) {
		case "zstd": {
			const raw = decompressZstd(frame);
			out = Buffer.isBuffer(raw) ? raw : Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
			break;
		}
		case "lz4":
			out = lz4.decode(frame);
			break;
		case "lzma1":
			throw new CompressionError("LZMA1 compressed data is not supported");
	}
	if (out.length !== expected) {
		throw new CompressionError(`Decompressed ${out.length} bytes, header says ${expected}`);
	}
	return out;
}
