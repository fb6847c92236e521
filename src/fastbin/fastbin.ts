/**
 * FASTBIN (.bmd) files: "FASTBIN0", u16 serialise version, then the sub-blocks.
 * The sub-block order of a version is not modelled; the body is carried as stored so the
 * file writes back unchanged. Single blocks decode through the formats in blocks.ts.
 */

import { ByteReader } from "../binary/reader.js";
import { U16_TAG, VersionedFormat } from "../binary/versioned.js";
import { ByteWriter } from "../binary/writer.js";
import { FormatError } from "../errors.js";

export const FASTBIN_SIGNATURE = Buffer.from("FASTBIN0", "latin1");

export interface FastBin {
	version: number;
	/** Sub-blocks as stored, everything after the version. */
	body: Buffer;
}

export interface FastBinFile {
	kind: "FastBin";
	data: FastBin;
}

export const fastBinFormat = new VersionedFormat<FastBin>("FastBin", U16_TAG).register(27, {
	read: (r) => ({ version: 27, body: Buffer.from(r.slice(r.remaining)) }),
	write: (w, value) => w.bytes(value.body)
});

export function decodeFastBin(bytes: Buffer): FastBinFile {
	const reader = new ByteReader(bytes);
	const signature = reader.peek(FASTBIN_SIGNATURE.length);
	if (!signature.equals(FASTBIN_SIGNATURE)) {
		throw new FormatError(`Unsupported FASTBIN signature: ${signature.toString("hex")}`);
	}
	reader.slice(FASTBIN_SIGNATURE.length);
	return { kind: "FastBin", data: fastBinFormat.decode(reader) };
}

export function encodeFastBin(file: FastBinFile): Buffer {
	const writer = new ByteWriter(FASTBIN_SIGNATURE.length + 2 + file.data.body.length);
	writer.bytes(FASTBIN_SIGNATURE);
	fastBinFormat.encode(writer, file.data);
	return writer.toBuffer();
}
