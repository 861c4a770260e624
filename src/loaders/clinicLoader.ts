import fs from 'fs/promises';
import path from 'path';
import {Workbook} from 'exceljs';
import {csvParse} from 'd3-dsv';
import {logger} from '../config/logger.js';
import {DataParseError} from '../types/errors.js';
import {Clinic} from '../types/domain.js';
import {parseCoordinatePair} from './coordinates.js';

export const DEFAULT_CLINIC_COLUMN = 'Coordinates';

export type ClinicLoadOptions = {
	/** Header of the combined "lat, lon" column */
	column?: string;
};

export type CoordinateCell = {
	row: number;
	value: string;
};

async function readWorkbookColumn(filePath: string, column: string): Promise<CoordinateCell[]> {
	const workbook = new Workbook();
	await workbook.xlsx.readFile(filePath);
	const sheet = workbook.worksheets[0];
	if (!sheet) {
		throw new DataParseError('workbook has no worksheets', filePath);
	}

	const header = sheet.getRow(1);
	let columnIndex = 0;
	for (let index = 1; index <= header.cellCount; index += 1) {
		if (header.getCell(index).text.trim() === column) {
			columnIndex = index;
			break;
		}
	}
	if (columnIndex === 0) {
		throw new DataParseError(`missing required column ${column}`, filePath);
	}

	const cells: CoordinateCell[] = [];
	for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
		cells.push({row: rowNumber, value: sheet.getRow(rowNumber).getCell(columnIndex).text});
	}
	return cells;
}

async function readCsvColumn(filePath: string, column: string): Promise<CoordinateCell[]> {
	const rows = csvParse(await fs.readFile(filePath, 'utf8'));
	if (!rows.columns.includes(column)) {
		throw new DataParseError(`missing required column ${column}`, filePath);
	}
	return rows.map((row, index) => ({row: index + 2, value: row[column] ?? ''}));
}

/**
 * Turn raw "lat, lon" cells into clinics. Trailing blank rows are ignored; any other row
 * that does not parse is an error naming the row.
 */
export function parseClinicCells(cells: CoordinateCell[], source: string): Clinic[] {
	let end = cells.length;
	while (end > 0 && (cells[end - 1]?.value ?? '').trim() === '') {
		end -= 1;
	}

	return cells.slice(0, end).map((cell) => {
		const point = parseCoordinatePair(cell.value);
		if (!point) {
			throw new DataParseError(`cannot parse coordinate "${cell.value}" as "lat, lon"`, source, cell.row);
		}
		return {...point, row: cell.row};
	});
}

export async function loadClinics(filePath: string, options: ClinicLoadOptions = {}): Promise<Clinic[]> {
	const column = options.column ?? DEFAULT_CLINIC_COLUMN;
	const extension = path.extname(filePath).toLowerCase();
	const cells = extension === '.csv' ? await readCsvColumn(filePath, column) : await readWorkbookColumn(filePath, column);
	const clinics = parseClinicCells(cells, filePath);
	logger.info({filePath, clinicCount: clinics.length}, 'Clinics loaded');
	return clinics;
}
