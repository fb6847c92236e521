/**
 * Registry that maps a leading version tag to the routine reading/writing
 * that exact version. Every nesting level owns its own registry, so an outer
 * format upgrade never forces new versions of the blocks inside it.
 */

import { UnsupportedVersionError } from "../errors.js";
import type { ByteReader } from "./reader.js";
import type { ByteWriter } from "./writer.js";

export interface VersionRoutines<T> {
	read(reader: ByteReader): T;
	write(writer: ByteWriter, value: T): void;
}

export interface VersionTag<V> {
	read(reader: ByteReader): V;
	write(writer: ByteWriter, version: V): void;
}

export const U16_TAG: VersionTag<number> = {
	read: (reader) => reader.u16(),
	write: (writer, version) => writer.u16(version)
};

export const U32_TAG: VersionTag<number> = {
	read: (reader) => reader.u32(),
	write: (writer, version) => writer.u32(version)
};

export class VersionedFormat<T extends { version: V }, V extends number | string = number> {
	private readonly routines = new Map<V, VersionRoutines<T>>();

	constructor(
		readonly entity: string,
		private readonly tag: VersionTag<V>
	) {}

	register(version: V, routines: VersionRoutines<T>): this {
		this.routines.set(version, routines);
		return this;
	}

	supports(version: V): boolean {
		return this.routines.has(version);
	}

	versions(): V[] {
		return [...this.routines.keys()];
	}

	private routinesFor(version: V): VersionRoutines<T> {
		const routines = this.routines.get(version);
		if (!routines) throw new UnsupportedVersionError(this.entity, version);
		return routines;
	}

	/** Reads the version tag, then the body for exactly that version. */
	decode(reader: ByteReader): T {
		const version = this.tag.read(reader);
		return this.routinesFor(version).read(reader);
	}

	encode(writer: ByteWriter, value: T): void {
		const routines = this.routinesFor(value.version);
		this.tag.write(writer, value.version);
		routines.write(writer, value);
	}
}
