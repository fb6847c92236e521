import { FieldTypeError } from "../errors.js";

/** Growable little-endian writer, the mirror of ByteReader. */
export class ByteWriter {
	private buffer: Buffer;
	private offset = 0;

	constructor(initialSize = 256) {
		this.buffer = Buffer.alloc(initialSize);
	}

	get length(): number {
		return this.offset;
	}

	private reserve(size: number): number {
		if (this.offset + size > this.buffer.length) {
			const next = Buffer.alloc(Math.max(this.buffer.length * 2, this.offset + size));
			this.buffer.copy(next, 0, 0, this.offset);
			this.buffer = next;
		}
		const start = this.offset;
		this.offset += size;
		return start;
	}

	bytes(data: Uint8Array): void {
		const start = this.reserve(data.length);
		this.buffer.set(data, start);
	}

	u8(value: number): void {
		this.buffer.writeUInt8(value, this.reserve(1));
	}

	i8(value: number): void {
		this.buffer.writeInt8(value, this.reserve(1));
	}

	u16(value: number): void {
		this.buffer.writeUInt16LE(value, this.reserve(2));
	}

	i16(value: number): void {
		this.buffer.writeInt16LE(value, this.reserve(2));
	}

	u32(value: number): void {
		this.buffer.writeUInt32LE(value, this.reserve(4));
	}

	i32(value: number): void {
		this.buffer.writeInt32LE(value, this.reserve(4));
	}

	u64(value: bigint): void {
		this.buffer.writeBigUInt64LE(value, this.reserve(8));
	}

	i64(value: bigint): void {
		this.buffer.writeBigInt64LE(value, this.reserve(8));
	}

	f32(value: number): void {
		this.buffer.writeFloatLE(value, this.reserve(4));
	}

	f64(value: number): void {
		this.buffer.writeDoubleLE(value, this.reserve(8));
	}

	bool(value: boolean): void {
		this.u8(value ? 1 : 0);
	}

	sizedStringU8(value: string): void {
		const enc = Buffer.from(value, "utf8");
		this.u16(enc.length);
		this.bytes(enc);
	}

	sizedStringU8U32(value: string): void {
		const enc = Buffer.from(value, "utf8");
		this.u32(enc.length);
		this.bytes(enc);
	}

	sizedStringU16(value: string): void {
		this.u16(value.length);
		this.bytes(Buffer.from(value, "utf16le"));
	}

	stringU8ZeroTerminated(value: string): void {
		this.bytes(Buffer.from(value, "utf8"));
		this.u8(0);
	}

	stringU8ZeroPadded(value: string, size: number): void {
		const enc = Buffer.from(value, "utf8");
		if (enc.length > size) {
			throw new FieldTypeError("string", `at most ${size} bytes`, `${enc.length} bytes`);
		}
		const padded = Buffer.alloc(size, 0);
		enc.copy(padded);
		this.bytes(padded);
	}

	optionalI16(value: number | null): void {
		this.bool(value !== null);
		if (value !== null) this.i16(value);
	}

	optionalI32(value: number | null): void {
		this.bool(value !== null);
		if (value !== null) this.i32(value);
	}

	optionalI64(value: bigint | null): void {
		this.bool(value !== null);
		if (value !== null) this.i64(value);
	}

	optionalStringU8(value: string | null): void {
		this.bool(value !== null);
		if (value !== null) this.sizedStringU8(value);
	}

	optionalStringU16(value: string | null): void {
		this.bool(value !== null);
		if (value !== null) this.sizedStringU16(value);
	}

	colourRGB(hex: string): void {
		const value = /^[0-9a-fA-F]{1,8}$/.test(hex) ? parseInt(hex, 16) : NaN;
		if (Number.isNaN(value)) {
			throw new FieldTypeError("colour", "ColourRGB hex string", JSON.stringify(hex));
		}
		this.u32(value);
	}

	toBuffer(): Buffer {
		return Buffer.from(this.buffer.subarray(0, this.offset));
	}
}
