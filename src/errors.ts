/**
 * Error classes shared by the pack engine, the record codec and the FASTBIN decoders.
 */

export class PackToolError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Bad signature, marker or magic. */
export class FormatError extends PackToolError {}

export class UnsupportedVersionError extends FormatError {
	constructor(
		public readonly entity: string,
		public readonly version: number | string
	) {
		super(`Unsupported ${entity} version: ${version}`);
	}
}

/** Header or index truncated, or the index does not add up to the file length. */
export class IndexError extends PackToolError {}

export class OutOfBoundsError extends IndexError {
	constructor(
		public readonly offset: number,
		public readonly requested: number,
		public readonly available: number
	) {
		super(`Read of ${requested} bytes at offset ${offset} exceeds buffer (${available} bytes left)`);
	}
}

export class NotLoadedError extends IndexError {}

export class SizeMismatchError extends PackToolError {
	constructor(
		public readonly expected: number,
		public readonly actual: number
	) {
		super(`Size mismatch: expected to end at ${expected}, stopped at ${actual}`);
	}
}

export class FieldDecodeError extends PackToolError {
	constructor(
		public readonly row: number,
		public readonly column: number,
		public readonly expectedType: string,
		cause?: unknown
	) {
		const detail = cause instanceof Error ? `: ${cause.message}` : "";
		super(`Error decoding Row ${row}, Cell ${column} as ${expectedType}${detail}`, { cause });
	}
}

export class FieldTypeError extends PackToolError {
	constructor(
		public readonly fieldName: string,
		public readonly expectedType: string,
		actual: string
	) {
		super(`Field "${fieldName}" expects ${expectedType}, got ${actual}`);
	}
}

export class RowArityError extends PackToolError {
	constructor(
		public readonly expected: number,
		public readonly actual: number
	) {
		super(`Row has ${actual} cells, definition needs ${expected}`);
	}
}

export class ImportFormatError extends PackToolError {}

export class CompressionError extends PackToolError {}

export class SchemaError extends PackToolError {}
