/**
 * Sequentieller Leser über einen Buffer. Alle Werte little-endian,
 * jeder Zugriff wird gegen das Pufferende geprüft.
 */

import { FormatError, OutOfBoundsError, SizeMismatchError } from "../errors.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export class ByteReader {
	private offset = 0;

	constructor(private readonly buffer: Buffer) {}

	get length(): number {
		return this.buffer.length;
	}

	get position(): number {
		return this.offset;
	}

	get remaining(): number {
		return this.buffer.length - this.offset;
	}

	seek(offset: number): void {
		if (offset < 0 || offset > this.buffer.length) {
			throw new OutOfBoundsError(offset, 0, this.buffer.length);
		}
		this.offset = offset;
	}

	private take(size: number): number {
		if (size > this.remaining) {
			throw new OutOfBoundsError(this.offset, size, this.remaining);
		}
		const start = this.offset;
		this.offset += size;
		return start;
	}

	slice(size: number): Buffer {
		const start = this.take(size);
		return this.buffer.subarray(start, start + size);
	}

	peek(size: number): Buffer {
		return this.buffer.subarray(this.offset, Math.min(this.offset + size, this.buffer.length));
	}

	u8(): number {
		return this.buffer.readUInt8(this.take(1));
	}

	i8(): number {
		return this.buffer.readInt8(this.take(1));
	}

	u16(): number {
		return this.buffer.readUInt16LE(this.take(2));
	}

	i16(): number {
		return this.buffer.readInt16LE(this.take(2));
	}

	u32(): number {
		return this.buffer.readUInt32LE(this.take(4));
	}

	i32(): number {
		return this.buffer.readInt32LE(this.take(4));
	}

	u64(): bigint {
		return this.buffer.readBigUInt64LE(this.take(8));
	}

	i64(): bigint {
		return this.buffer.readBigInt64LE(this.take(8));
	}

	f32(): number {
		return this.buffer.readFloatLE(this.take(4));
	}

	f64(): number {
		return this.buffer.readDoubleLE(this.take(8));
	}

	/** Only 0 and 1 are valid booleans. */
	bool(): boolean {
		const at = this.offset;
		const value = this.u8();
		if (value > 1) {
			this.offset = at;
			throw new FormatError(`Invalid boolean value ${value} at offset ${at}`);
		}
		return value === 1;
	}

	/** Ungültiges UTF-8 wird abgelehnt; der Leser bleibt dann bei `at` stehen. */
	private utf8(bytes: Uint8Array, at: number): string {
		try {
			return utf8Decoder.decode(bytes);
		} catch (err) {
			this.offset = at;
			throw new FormatError(`Invalid UTF-8 string at offset ${at}`, { cause: err });
		}
	}

	/** u16 byte length + UTF-8. */
	sizedStringU8(): string {
		const at = this.offset;
		const size = this.u16();
		if (size > this.remaining) {
			this.offset = at;
			throw new OutOfBoundsError(at + 2, size, this.remaining);
		}
		return this.utf8(this.slice(size), at);
	}

	/** u32 byte length + UTF-8. */
	sizedStringU8U32(): string {
		const at = this.offset;
		const size = this.u32();
		if (size > this.remaining) {
			this.offset = at;
			throw new OutOfBoundsError(at + 4, size, this.remaining);
		}
		return this.utf8(this.slice(size), at);
	}

	/** u16 character count + UTF-16LE. */
	sizedStringU16(): string {
		const at = this.offset;
		const chars = this.u16();
		if (chars * 2 > this.remaining) {
			this.offset = at;
			throw new OutOfBoundsError(at + 2, chars * 2, this.remaining);
		}
		return this.slice(chars * 2).toString("utf16le");
	}

	stringU8ZeroTerminated(): string {
		const end = this.buffer.indexOf(0, this.offset);
		if (end === -1) {
			throw new OutOfBoundsError(this.offset, this.remaining + 1, this.remaining);
		}
		const value = this.utf8(this.buffer.subarray(this.offset, end), this.offset);
		this.offset = end + 1;
		return value;
	}

	/** Fixed width field, content ends at the first zero byte. */
	stringU8ZeroPadded(size: number): string {
		const at = this.offset;
		const raw = this.slice(size);
		const end = raw.indexOf(0);
		return this.utf8(raw.subarray(0, end === -1 ? raw.length : end), at);
	}

	optionalI16(): number | null {
		return this.bool() ? this.i16() : null;
	}

	optionalI32(): number | null {
		return this.bool() ? this.i32() : null;
	}

	optionalI64(): bigint | null {
		return this.bool() ? this.i64() : null;
	}

	optionalStringU8(): string | null {
		return this.bool() ? this.sizedStringU8() : null;
	}

	optionalStringU16(): string | null {
		return this.bool() ? this.sizedStringU16() : null;
	}

	/** u32 0x00RRGGBB, returned as hex string. */
	colourRGB(): string {
		return this.u32().toString(16).toUpperCase().padStart(6, "0");
	}
}

/** Decoders must stop exactly at the end of their data. */
export function checkSizeMismatch(position: number, length: number): void {
	if (position !== length) {
		throw new SizeMismatchError(length, position);
	}
}
