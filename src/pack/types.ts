/**
 * Pack (PFH) container types.
 * Header layouts per version: PFH0 24 B, PFH2/PFH3 32 B, PFH4 28 B, PFH5 28 B (+20 extended), PFH6 308 B.
 */

import type { LazyData } from "./source.js";

export const PACK_VERSIONS = ["PFH0", "PFH2", "PFH3", "PFH4", "PFH5", "PFH6"] as const;
export type PackVersion = (typeof PACK_VERSIONS)[number];

export enum PackFileType {
	Boot = 0,
	Release = 1,
	Patch = 2,
	Mod = 3,
	Movie = 4
}

export const PackFlags = {
	HAS_EXTENDED_HEADER: 0x100,
	HAS_ENCRYPTED_INDEX: 0x80,
	HAS_INDEX_WITH_TIMESTAMPS: 0x40,
	HAS_ENCRYPTED_DATA: 0x10
} as const;

/** Type word = file type (low nibble) | flags. */
export const FILE_TYPE_MASK = 0x0f;

export const EXTENDED_HEADER_SIZE = 20;
export const FOOTER_SIZE = 256;
export const PFH6_HEADER_SIZE = 308;
export const AUTHORING_TOOL_SIZE = 8;
export const DEFAULT_AUTHORING_TOOL = "CA_TOOL";

export const RESERVED_NOTES_PATH = "notes.rpfm_reserved";
export const RESERVED_SETTINGS_PATH = "settings.rpfm_reserved";

export interface PackHeader {
	version: PackVersion;
	fileType: PackFileType;
	/** Bitmask of PackFlags. */
	flags: number;
	/** FILETIME (u64) for PFH2/PFH3, seconds (u32) for PFH4+, 0 for PFH0. */
	timestamp: bigint;
	/** PFH6 only, like the two fields below and the authoring tool. */
	subheaderMark: number;
	subheaderVersion: number;
	gameVersion: number;
	buildNumber: number;
	authoringTool: string;
	/** Opaque header tail: PFH6 subheader bytes 52..308, or the 20 extended bytes of PFH5. */
	subheader: Buffer;
	/** Opaque 256 trailing bytes of extended-header archives. */
	footer?: Buffer;
}

/** Counts and sizes read from the fixed header fields. */
export interface IndexCounts {
	dependencyCount: number;
	dependencyIndexSize: number;
	entryCount: number;
	entryIndexSize: number;
}

export type EntryData = { kind: "lazy"; data: LazyData } | { kind: "memory"; bytes: Buffer };

export function hasFlag(flags: number, flag: number): boolean {
	return (flags & flag) === flag;
}

export function isPackVersion(value: string): value is PackVersion {
	return PACK_VERSIONS.some((v) => v === value);
}

/** Versions whose index carries a per-entry compression byte (when no extended header is present). */
export function hasCompressionByte(header: Pick<PackHeader, "version" | "flags">): boolean {
	return (header.version === "PFH5" || header.version === "PFH6") && !hasFlag(header.flags, PackFlags.HAS_EXTENDED_HEADER);
}

export function emptyHeader(version: PackVersion = "PFH5", fileType: PackFileType = PackFileType.Mod): PackHeader {
	return {
		version,
		fileType,
		flags: 0,
		timestamp: 0n,
		subheaderMark: 0,
		subheaderVersion: 0,
		gameVersion: 0,
		buildNumber: 0,
		authoringTool: DEFAULT_AUTHORING_TOOL,
		subheader: Buffer.alloc(version === "PFH6" ? PFH6_HEADER_SIZE - 52 : 0)
	};
}
