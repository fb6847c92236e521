/**
 * Lazy byte sources. A pack opened from disk keeps one shared FileSource; every entry
 * holds a LazyData window into it and reads its bytes on first use.
 */

import { type FileHandle, open } from "node:fs/promises";
import { NotLoadedError, OutOfBoundsError } from "../errors.js";

/** Runs async tasks one at a time, in call order. */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();

	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.then(
			() => undefined,
			() => undefined
		);
		return result;
	}
}

export interface ByteSource {
	readonly length: number;
	read(offset: number, size: number): Promise<Buffer>;
	/** Registers one more owner. */
	retain(): this;
	/** Drops one owner; the underlying resource is closed with the last one. */
	release(): Promise<void>;
}

function checkRange(offset: number, size: number, length: number): void {
	if (offset < 0 || size < 0 || offset + size > length) {
		throw new OutOfBoundsError(offset, size, Math.max(0, length - offset));
	}
}

export class FileSource implements ByteSource {
	private readonly lock = new Mutex();
	private refs = 1;

	private constructor(
		readonly path: string,
		private readonly handle: FileHandle,
		readonly length: number
	) {}

	static async open(path: string): Promise<FileSource> {
		const handle = await open(path, "r");
		try {
			const { size } = await handle.stat();
			return new FileSource(path, handle, size);
		} catch (err) {
			await handle.close();
			throw err;
		}
	}

	get closed(): boolean {
		return this.refs === 0;
	}

	read(offset: number, size: number): Promise<Buffer> {
		return this.lock.run(async () => {
			if (this.refs === 0) throw new NotLoadedError(`Source ${this.path} is already closed`);
			checkRange(offset, size, this.length);
			const out = Buffer.alloc(size);
			let done = 0;
			while (done < size) {
				const { bytesRead } = await this.handle.read(out, done, size - done, offset + done);
				if (bytesRead === 0) throw new OutOfBoundsError(offset + done, size - done, 0);
				done += bytesRead;
			}
			return out;
		});
	}

	retain(): this {
		this.refs++;
		return this;
	}

	release(): Promise<void> {
		return this.lock.run(async () => {
			if (this.refs === 0) return;
			this.refs--;
			if (this.refs === 0) await this.handle.close();
		});
	}
}

export class MemorySource implements ByteSource {
	private refs = 1;

	constructor(private readonly buffer: Buffer) {}

	get length(): number {
		return this.buffer.length;
	}

	get closed(): boolean {
		return this.refs === 0;
	}

	async read(offset: number, size: number): Promise<Buffer> {
		checkRange(offset, size, this.buffer.length);
		return Buffer.from(this.buffer.subarray(offset, offset + size));
	}

	retain(): this {
		this.refs++;
		return this;
	}

	async release(): Promise<void> {
		if (this.refs > 0) this.refs--;
	}
}

/** Window of a source; the bytes are fetched once and kept. */
export class LazyData {
	private data: Buffer | undefined;
	private pending: Promise<Buffer> | undefined;

	constructor(
		readonly source: ByteSource,
		readonly offset: number,
		readonly size: number
	) {}

	get loaded(): boolean {
		return this.data !== undefined;
	}

	load(): Promise<Buffer> {
		if (this.data) return Promise.resolve(this.data);
		if (!this.pending) {
			this.pending = this.source.read(this.offset, this.size).then(
				(bytes) => {
					this.data = bytes;
					this.pending = undefined;
					return bytes;
				},
				(err: unknown) => {
					this.pending = undefined;
					throw err;
				}
			);
		}
		return this.pending;
	}

	cached(): Buffer {
		if (!this.data) {
			throw new NotLoadedError(`Data at offset ${this.offset} (${this.size} bytes) has not been loaded`);
		}
		return this.data;
	}
}
