/**
 * Pack: header, dependencies, notes, settings and a path → entry map.
 */

import { writeFile } from "node:fs/promises";
import { IndexError } from "../errors.js";
import type { DecodeContext, DecodedFile } from "../files/decoded.js";
import { PackEntry, normalizePath } from "./entry.js";
import type { FileType } from "./file-type.js";
import { type ReservedEntries, readPack, type ReadPackOptions } from "./reader.js";
import { type PackSettings, defaultSettings } from "./settings.js";
import { type ByteSource, FileSource, MemorySource } from "./source.js";
import { type PackFileType, PackFlags, type PackHeader, type PackVersion, emptyHeader } from "./types.js";
import { writePack, type WritePackOptions } from "./writer.js";

export interface EntryFilter {
	types?: FileType[];
	/** Path prefix, "/"-separated, compared case-insensitively. */
	prefix?: string;
}

export class Pack {
	header: PackHeader;
	readonly dependencies: string[] = [];
	notes: string | undefined;
	settings: PackSettings = defaultSettings();
	private readonly files = new Map<string, PackEntry>();
	private source: ByteSource | undefined;
	private reserved: ReservedEntries = {};

	constructor(header: PackHeader = emptyHeader()) {
		this.header = header;
	}

	static create(version: PackVersion = "PFH5", fileType?: PackFileType): Pack {
		return new Pack(emptyHeader(version, fileType));
	}

	/** Opens a pack file. Entry data stays on disk until loaded, unless `lazy` is false. */
	static async open(path: string, options: ReadPackOptions = {}): Promise<Pack> {
		return Pack.fromSource(await FileSource.open(path), options);
	}

	static async fromBuffer(buffer: Buffer, options: ReadPackOptions = {}): Promise<Pack> {
		return Pack.fromSource(new MemorySource(buffer), options);
	}

	/** Takes over one reference of the source; it is released on close() or on failure. */
	static async fromSource(source: ByteSource, options: ReadPackOptions = {}): Promise<Pack> {
		try {
			const contents = await readPack(source, options);
			const pack = new Pack(contents.header);
			pack.source = source;
			pack.dependencies.push(...contents.dependencies);
			pack.notes = contents.notes;
			pack.settings = contents.settings;
			pack.reserved = contents.reserved;
			for (const entry of contents.entries) pack.files.set(entry.path, entry);
			return pack;
		} catch (err) {
			await source.release();
			throw err;
		}
	}

	get size(): number {
		return this.files.size;
	}

	has(path: string): boolean {
		return this.files.has(normalizePath(path));
	}

	get(path: string): PackEntry | undefined {
		return this.files.get(normalizePath(path));
	}

	paths(): string[] {
		return [...this.files.keys()];
	}

	entries(filter: EntryFilter = {}): PackEntry[] {
		const prefix = filter.prefix ? normalizePath(filter.prefix).toLowerCase() : undefined;
		return [...this.files.values()].filter(
			(entry) =>
				(!filter.types || filter.types.includes(entry.type)) &&
				(prefix === undefined || entry.path.toLowerCase().startsWith(prefix))
		);
	}

	/** Adds or replaces an entry; a later insert under the same path wins. */
	insert(path: string, contents: Buffer | DecodedFile, timestamp?: bigint): PackEntry {
		const entry = Buffer.isBuffer(contents)
			? PackEntry.fromBytes(path, contents, timestamp)
			: PackEntry.fromDecoded(path, contents, timestamp);
		this.files.set(entry.path, entry);
		return entry;
	}

	remove(path: string): boolean {
		return this.files.delete(normalizePath(path));
	}

	/** Removes every entry under a folder prefix; returns the removed paths. */
	removePrefix(prefix: string): string[] {
		const removed = this.entries({ prefix }).map((entry) => entry.path);
		for (const path of removed) this.files.delete(path);
		return removed;
	}

	rename(from: string, to: string): PackEntry {
		const entry = this.get(from);
		if (!entry) throw new IndexError(`No entry at ${from}`);
		this.files.delete(entry.path);
		entry.setPath(to);
		this.files.set(entry.path, entry);
		return entry;
	}

	setDecoded(path: string, decoded: DecodedFile): PackEntry {
		const entry = this.get(path);
		if (!entry) return this.insert(path, decoded);
		entry.setDecoded(decoded);
		return entry;
	}

	async load(filter: EntryFilter = {}): Promise<void> {
		await Promise.all(this.entries(filter).map((entry) => entry.load()));
	}

	/** Decodes the matching entries in parallel; entries of raw-only types are left out. */
	async decode(filter: EntryFilter = {}, ctx: DecodeContext = {}): Promise<Map<string, DecodedFile>> {
		const entries = this.entries(filter);
		const decoded = await Promise.all(entries.map((entry) => entry.decode(ctx)));
		const out = new Map<string, DecodedFile>();
		entries.forEach((entry, i) => {
			const file = decoded[i];
			if (file) out.set(entry.path, file);
		});
		return out;
	}

	/** Builds the complete archive in memory. */
	encode(options: WritePackOptions = {}): Promise<Buffer> {
		return writePack(
			{
				header: this.header,
				dependencies: this.dependencies,
				entries: [...this.files.values()],
				notes: this.notes,
				settings: this.settings,
				reserved: this.reserved
			},
			options
		);
	}

	/** Encodes the pack, then writes it; returns the number of bytes written. A failed encode leaves the destination untouched. */
	async save(path: string, options: WritePackOptions = {}): Promise<number> {
		const bytes = await this.encode(options);
		await writeFile(path, bytes);
		this.header = {
			...this.header,
			flags: this.header.flags & ~(PackFlags.HAS_ENCRYPTED_INDEX | PackFlags.HAS_ENCRYPTED_DATA),
			timestamp: options.timestamp ?? this.header.timestamp
		};
		return bytes.length;
	}

	async close(): Promise<void> {
		const source = this.source;
		this.source = undefined;
		if (source) await source.release();
	}
}
