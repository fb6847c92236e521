/**
 * One file inside a pack. The data is either a lazy window into the pack's source or a
 * resident buffer; `compressed`/`encrypted` describe the bytes as they are stored.
 */

import { type DecodedFile, type DecodeContext, decodeFile, encodeFile } from "../files/decoded.js";
import { type CompressionFormat, DEFAULT_COMPRESSION_FORMAT, compressData, decompressData } from "./compression.js";
import { decryptData } from "./crypto.js";
import { type FileType, fileTypeOf, isTableType } from "./file-type.js";
import type { LazyData } from "./source.js";
import type { EntryData } from "./types.js";

export function normalizePath(path: string): string {
	return path.replace(/\\/g, "/").replace(/^\/+/, "");
}

export function diskPath(path: string): string {
	return path.replace(/\//g, "\\");
}

export interface StoreOptions {
	/** Target compression; undefined keeps the entry's current state. */
	compress?: boolean;
	compressionFormat?: CompressionFormat;
	/** False for pack versions without a per-entry compression flag. */
	canCompress: boolean;
}

export class PackEntry {
	private data: EntryData;
	private decodedFile: DecodedFile | undefined;

	private constructor(
		private entryPath: string,
		data: EntryData,
		public compressed: boolean,
		public encrypted: boolean,
		public timestamp: bigint | undefined
	) {
		this.data = data;
	}

	static lazy(path: string, data: LazyData, flags: { compressed: boolean; encrypted: boolean; timestamp?: bigint }): PackEntry {
		return new PackEntry(normalizePath(path), { kind: "lazy", data }, flags.compressed, flags.encrypted, flags.timestamp);
	}

	/** Entry over plain (uncompressed, unencrypted) bytes. */
	static fromBytes(path: string, bytes: Buffer, timestamp?: bigint): PackEntry {
		return new PackEntry(normalizePath(path), { kind: "memory", bytes }, false, false, timestamp);
	}

	static fromDecoded(path: string, decoded: DecodedFile, timestamp?: bigint): PackEntry {
		const entry = PackEntry.fromBytes(path, encodeFile(decoded), timestamp);
		entry.decodedFile = decoded;
		return entry;
	}

	get path(): string {
		return this.entryPath;
	}

	/** Only the owning Pack renames entries, so its map key stays in sync. */
	setPath(path: string): void {
		this.entryPath = normalizePath(path);
	}

	get type(): FileType {
		return fileTypeOf(this.entryPath);
	}

	get decoded(): DecodedFile | undefined {
		return this.decodedFile;
	}

	/** Size of the stored bytes. */
	get size(): number {
		return this.data.kind === "lazy" ? this.data.data.size : this.data.bytes.length;
	}

	get loaded(): boolean {
		return this.data.kind === "memory" || this.data.data.loaded;
	}

	async load(): Promise<void> {
		if (this.data.kind === "lazy") await this.data.data.load();
	}

	/** Bytes exactly as stored (possibly compressed or encrypted). */
	async storedBytes(): Promise<Buffer> {
		return this.data.kind === "lazy" ? this.data.data.load() : this.data.bytes;
	}

	/** Stored bytes, without touching the source; fails when a lazy entry was never loaded. */
	cachedStoredBytes(): Buffer {
		return this.data.kind === "lazy" ? this.data.data.cached() : this.data.bytes;
	}

	private plain(stored: Buffer): Buffer {
		const decrypted = this.encrypted ? decryptData(stored) : stored;
		return this.compressed ? decompressData(decrypted) : decrypted;
	}

	/** Plain contents; a decoded structure wins over the stored bytes. */
	async bytes(): Promise<Buffer> {
		if (this.decodedFile) return encodeFile(this.decodedFile);
		return this.plain(await this.storedBytes());
	}

	cachedBytes(): Buffer {
		if (this.decodedFile) return encodeFile(this.decodedFile);
		return this.plain(this.cachedStoredBytes());
	}

	setBytes(bytes: Buffer): void {
		this.data = { kind: "memory", bytes };
		this.compressed = false;
		this.encrypted = false;
		this.decodedFile = undefined;
	}

	setDecoded(decoded: DecodedFile): void {
		this.decodedFile = decoded;
	}

	async decode(ctx: DecodeContext = {}): Promise<DecodedFile | undefined> {
		if (this.decodedFile) return this.decodedFile;
		this.decodedFile = decodeFile(this.entryPath, await this.bytes(), ctx);
		return this.decodedFile;
	}

	/**
	 * Brings the entry into its on-disk form for saving and returns those bytes.
	 * Decoded structures are re-encoded, encryption is removed, tables are stored uncompressed.
	 */
	async prepareForSave(options: StoreOptions): Promise<Buffer> {
		const wanted = options.canCompress && !isTableType(this.type) && (options.compress ?? this.compressed);
		const format = options.compressionFormat ?? DEFAULT_COMPRESSION_FORMAT;

		let stored: Buffer;
		if (this.decodedFile) {
			const plain = encodeFile(this.decodedFile);
			stored = wanted ? compressData(plain, format) : plain;
		} else {
			let raw = await this.storedBytes();
			if (this.encrypted) raw = decryptData(raw);
			if (wanted && !this.compressed) stored = compressData(raw, format);
			else if (!wanted && this.compressed) stored = decompressData(raw);
			else stored = raw;
		}

		this.data = { kind: "memory", bytes: stored };
		this.compressed = wanted;
		this.encrypted = false;
		return stored;
	}
}
