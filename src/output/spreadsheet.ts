/**
 * Courier Spreadsheet
 *
 * Fills the first worksheet of a courier import template. Templates carry no
 * header row as a rule, so records go at the first row whose mapped columns
 * are all empty; anything already in the template is left in place.
 */

import * as XLSX from 'xlsx';
import { OPTIONAL_MAPPING_FIELDS, REQUIRED_MAPPING_FIELDS } from '../constants';
import type { MappingField, TemplateMapping } from '../config/types';
import type { AddressRecord } from '../parser/types';

const MAPPING_FIELDS: readonly MappingField[] = [...REQUIRED_MAPPING_FIELDS, ...OPTIONAL_MAPPING_FIELDS];

const UPPERCASE_FIELDS = new Set(['postcode', 'country']);

type CellValue = string | number;

const isBlank = (cell: XLSX.CellObject | undefined): boolean =>
    cell === undefined || cell.v === undefined || cell.v === null || cell.v === '';

export const blankWorkbook = (): XLSX.WorkBook => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([]), 'Sheet1');
    return workbook;
};

export const firstSheet = (workbook: XLSX.WorkBook): XLSX.WorkSheet => {
    const name = workbook.SheetNames[0];
    const sheet = name === undefined ? undefined : workbook.Sheets[name];
    if (!sheet) {
        throw new Error('Template workbook has no worksheets');
    }
    return sheet;
};

export const usedColumnCount = (sheet: XLSX.WorkSheet): number => {
    const ref = sheet['!ref'];
    return ref ? XLSX.utils.decode_range(ref).e.c + 1 : 0;
};

/** 0-based index of the first row whose mapped columns are all empty. */
export const findFirstEmptyRow = (sheet: XLSX.WorkSheet, columns: number[]): number => {
    const ref = sheet['!ref'];
    const lastRow = ref ? XLSX.utils.decode_range(ref).e.r : -1;
    for (let row = 0; row <= lastRow; row++) {
        const empty = columns.every(column => isBlank(sheet[XLSX.utils.encode_cell({ r: row, c: column - 1 })]));
        if (empty) return row;
    }
    return lastRow + 1;
};

const cellValue = (record: AddressRecord, field: MappingField): CellValue => {
    if (field === 'weight_kg') return record.weight_kg;
    const raw = (record[field] ?? '').trim();
    return UPPERCASE_FIELDS.has(field) ? raw.toUpperCase() : raw;
};

/**
 * Writes one row per record starting at the first empty row. Returns the
 * 0-based index of the first row written.
 */
export const appendRecords = (
    sheet: XLSX.WorkSheet,
    records: readonly AddressRecord[],
    mapping: TemplateMapping
): number => {
    const entries = MAPPING_FIELDS.flatMap(field => {
        const column = mapping[field];
        return column === undefined ? [] : [{ field, column }];
    });
    const startRow = findFirstEmptyRow(sheet, entries.map(entry => entry.column));

    records.forEach((record, offset) => {
        for (const { field, column } of entries) {
            XLSX.utils.sheet_add_aoa(sheet, [[cellValue(record, field)]], {
                origin: { r: startRow + offset, c: column - 1 },
            });
        }
    });
    return startRow;
};

export const toBuffer = (workbook: XLSX.WorkBook): Buffer =>
    XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
