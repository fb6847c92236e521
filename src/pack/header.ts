/**
 * PFH header read/write. The 4-byte preamble selects the layout; the rest of the header
 * is read from the fixed offsets of that version.
 */

import { ByteReader } from "../binary/reader.js";
import { type VersionRoutines, type VersionTag, VersionedFormat } from "../binary/versioned.js";
import type { ByteWriter } from "../binary/writer.js";
import { UnsupportedVersionError } from "../errors.js";
import {
	AUTHORING_TOOL_SIZE,
	EXTENDED_HEADER_SIZE,
	FILE_TYPE_MASK,
	type IndexCounts,
	PFH6_HEADER_SIZE,
	type PackFileType,
	type PackHeader,
	PackFlags,
	type PackVersion,
	hasFlag,
	isPackVersion
} from "./types.js";

export type HeaderRecord = PackHeader & { counts: IndexCounts };

/** Bytes before the first count: preamble + type word. */
export const HEADER_PREFIX_SIZE = 8;

const BASE_HEADER_SIZES: Record<PackVersion, number> = {
	PFH0: 24,
	PFH2: 32,
	PFH3: 32,
	PFH4: 28,
	PFH5: 28,
	PFH6: PFH6_HEADER_SIZE
};

/** End of the fields this module interprets; everything after it up to the header size is the opaque subheader. */
const FIELDS_END: Record<PackVersion, number> = {
	PFH0: 24,
	PFH2: 32,
	PFH3: 32,
	PFH4: 28,
	PFH5: 28,
	PFH6: 44 + AUTHORING_TOOL_SIZE
};

export function headerSize(version: PackVersion, flags: number): number {
	const extended = (version === "PFH5" || version === "PFH6") && hasFlag(flags, PackFlags.HAS_EXTENDED_HEADER);
	return BASE_HEADER_SIZES[version] + (extended ? EXTENDED_HEADER_SIZE : 0);
}

export function subheaderSize(version: PackVersion, flags: number): number {
	return headerSize(version, flags) - FIELDS_END[version];
}

/** Reads preamble and type word from the first 8 bytes. */
export function readHeaderPrefix(bytes: Buffer): { version: PackVersion; fileType: PackFileType; flags: number } {
	const reader = new ByteReader(bytes);
	const preamble = reader.slice(4).toString("latin1");
	if (!isPackVersion(preamble)) throw new UnsupportedVersionError("PackHeader", preamble);
	const typeWord = reader.u32();
	return { version: preamble, fileType: fileTypeFromWord(typeWord), flags: typeWord & ~FILE_TYPE_MASK };
}

function fileTypeFromWord(word: number): PackFileType {
	const value = word & FILE_TYPE_MASK;
	if (value > 4) throw new UnsupportedVersionError("PackFileType", value);
	return value;
}

const PREAMBLE_TAG: VersionTag<string> = {
	read: (reader) => reader.slice(4).toString("latin1"),
	write: (writer, version) => writer.bytes(Buffer.from(version, "latin1"))
};

function readCommon(reader: ByteReader, version: PackVersion): Omit<HeaderRecord, "timestamp" | "subheader"> {
	const typeWord = reader.u32();
	const counts: IndexCounts = {
		dependencyCount: reader.u32(),
		dependencyIndexSize: reader.u32(),
		entryCount: reader.u32(),
		entryIndexSize: reader.u32()
	};
	return {
		version,
		fileType: fileTypeFromWord(typeWord),
		flags: typeWord & ~FILE_TYPE_MASK,
		gameVersion: 0,
		buildNumber: 0,
		authoringTool: "",
		subheaderMark: 0,
		subheaderVersion: 0,
		counts
	};
}

function writeCommon(writer: ByteWriter, header: HeaderRecord): void {
	writer.u32(((header.flags & ~FILE_TYPE_MASK) | header.fileType) >>> 0);
	writer.u32(header.counts.dependencyCount);
	writer.u32(header.counts.dependencyIndexSize);
	writer.u32(header.counts.entryCount);
	writer.u32(header.counts.entryIndexSize);
}

/** Opaque tail, padded or cut to the exact size the version expects. */
function writeSubheader(writer: ByteWriter, header: HeaderRecord): void {
	const size = subheaderSize(header.version, header.flags);
	const out = Buffer.alloc(size);
	header.subheader.copy(out, 0, 0, Math.min(size, header.subheader.length));
	writer.bytes(out);
}

function routines(
	version: PackVersion,
	timestamp: "none" | "u32" | "u64"
): VersionRoutines<HeaderRecord> {
	return {
		read: (reader) => {
			const common = readCommon(reader, version);
			const value =
				timestamp === "u64" ? reader.u64() : timestamp === "u32" ? BigInt(reader.u32()) : 0n;
			if (version === "PFH6") {
				common.subheaderMark = reader.u32();
				common.subheaderVersion = reader.u32();
				common.gameVersion = reader.u32();
				common.buildNumber = reader.u32();
				common.authoringTool = reader.stringU8ZeroPadded(AUTHORING_TOOL_SIZE);
			}
			return { ...common, timestamp: value, subheader: Buffer.from(reader.slice(reader.remaining)) };
		},
		write: (writer, header) => {
			writeCommon(writer, header);
			if (timestamp === "u64") writer.u64(BigInt.asUintN(64, header.timestamp));
			else if (timestamp === "u32") writer.u32(Number(BigInt.asUintN(32, header.timestamp)));
			if (version === "PFH6") {
				writer.u32(header.subheaderMark);
				writer.u32(header.subheaderVersion);
				writer.u32(header.gameVersion);
				writer.u32(header.buildNumber);
				writer.stringU8ZeroPadded(header.authoringTool, AUTHORING_TOOL_SIZE);
			}
			writeSubheader(writer, header);
		}
	};
}

/** Reader must cover exactly the header bytes (see headerSize). */
export const packHeaderFormat = new VersionedFormat<HeaderRecord, string>("PackHeader", PREAMBLE_TAG)
	.register("PFH0", routines("PFH0", "none"))
	.register("PFH2", routines("PFH2", "u64"))
	.register("PFH3", routines("PFH3", "u64"))
	.register("PFH4", routines("PFH4", "u32"))
	.register("PFH5", routines("PFH5", "u32"))
	.register("PFH6", routines("PFH6", "u32"));
