/**
 * In-memory table: a definition plus rows aligned with its processed columns.
 */

import type { ByteReader } from "../binary/reader.js";
import type { ByteWriter } from "../binary/writer.js";
import { FieldTypeError, RowArityError } from "../errors.js";
import { processedFields } from "../schema/definition.js";
import { type Definition, type Field, fieldTypeName } from "../schema/types.js";
import {
	type DecodedRows,
	type ReadonlyRow,
	type Row,
	type TableDecodeOptions,
	decodeTable,
	encodeTable
} from "./codec.js";
import { convertBetweenTypes, defaultCell, matchesFieldType, type DecodedData } from "./decoded-data.js";

export class Table {
	private currentDefinition: Definition;
	private columnsCache: Field[];
	private tableRows: Row[] = [];

	constructor(
		readonly name: string,
		definition: Definition,
		rows: readonly ReadonlyRow[] = []
	) {
		this.currentDefinition = definition;
		this.columnsCache = processedFields(definition);
		this.setRows(rows);
	}

	/** Decodes count rows (or a u32 count followed by rows) with the given definition. */
	static decode(
		name: string,
		definition: Definition,
		reader: ByteReader,
		count?: number,
		options: TableDecodeOptions = {}
	): { table: Table; incomplete: DecodedRows["incomplete"] } {
		const decoded = decodeTable(definition, reader, count, options);
		const table = new Table(name, definition);
		// Partial rows do not match the column layout, so they skip validation.
		table.tableRows = decoded.rows;
		return { table, incomplete: decoded.incomplete };
	}

	get definition(): Definition {
		return this.currentDefinition;
	}

	/** Read-only view; cells change through setCell, insertRow and removeRow. */
	get rows(): readonly ReadonlyRow[] {
		return this.tableRows;
	}

	get columns(): readonly Field[] {
		return this.columnsCache;
	}

	get length(): number {
		return this.tableRows.length;
	}

	columnIndex(name: string): number {
		return this.columnsCache.findIndex((c) => c.name === name);
	}

	defaultRow(): Row {
		return this.columnsCache.map((column) => defaultCell(column));
	}

	private validateRow(row: ReadonlyRow, index: number): void {
		if (row.length !== this.columnsCache.length) throw new RowArityError(this.columnsCache.length, row.length);
		row.forEach((cell, column) => this.validateCell(cell, column, index));
	}

	private validateCell(cell: DecodedData, column: number, rowIndex: number): void {
		const field = this.columnsCache[column];
		if (!field) throw new RowArityError(this.columnsCache.length, column + 1);
		if (!matchesFieldType(cell, field.fieldType)) {
			throw new FieldTypeError(`${field.name} (row ${rowIndex + 1})`, fieldTypeName(field.fieldType), cell.type);
		}
	}

	/** Replaces all rows with copies; every row must match the processed columns in count and type. */
	setRows(rows: readonly ReadonlyRow[]): void {
		rows.forEach((row, index) => this.validateRow(row, index));
		this.tableRows = rows.map((row) => [...row]);
	}

	/** Inserts a row (the default row when none is given); appends when index is omitted. */
	insertRow(row: ReadonlyRow = this.defaultRow(), index = this.tableRows.length): void {
		this.validateRow(row, index);
		this.tableRows.splice(index, 0, [...row]);
	}

	removeRow(index: number): Row {
		const [removed] = this.tableRows.splice(index, 1);
		if (!removed) throw new RowArityError(this.tableRows.length, index + 1);
		return removed;
	}

	getCell(row: number, column: number): DecodedData | undefined {
		return this.tableRows[row]?.[column];
	}

	setCell(row: number, column: number, value: DecodedData): void {
		const target = this.tableRows[row];
		if (!target) throw new RowArityError(this.tableRows.length, row + 1);
		this.validateCell(value, column, row);
		target[column] = value;
	}

	/**
	 * Switches to another version of the definition. Columns are matched by name; matched
	 * cells are converted to the new type, new columns get their default.
	 */
	setDefinition(definition: Definition): void {
		const next = processedFields(definition);
		const mapping = next.map((field) => this.columnIndex(field.name));
		this.tableRows = this.tableRows.map((row) =>
			next.map((field, i) => {
				const from = mapping[i] ?? -1;
				const cell = from === -1 ? undefined : row[from];
				return cell === undefined ? defaultCell(field) : convertBetweenTypes(cell, field);
			})
		);
		this.currentDefinition = definition;
		this.columnsCache = next;
	}

	encode(writer: ByteWriter): void {
		encodeTable(this.currentDefinition, this.tableRows, writer);
	}
}
