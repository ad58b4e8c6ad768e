/**
 * Output
 *
 * Courier spreadsheets and tracking CSVs for finished batches.
 */

export { create } from './writer';
export type { OutputInstance } from './writer';
export { appendRecords, blankWorkbook, findFirstEmptyRow, firstSheet } from './spreadsheet';
export { trackingCsv, TRACKING_COLUMNS } from './tracking';

// Re-export types
export * from './types';
