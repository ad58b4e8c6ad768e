import * as XLSX from 'xlsx';
import type { TrackedRecord } from './types';

export const TRACKING_COLUMNS = ['full_name', 'postcode', 'service', 'weight_kg', 'reference', 'notes', 'ai_flag'] as const;

export const trackingCsv = (entries: readonly TrackedRecord[]): string => {
    const rows: Array<Array<string | number>> = [
        [...TRACKING_COLUMNS],
        ...entries.map(({ record, ai_flag }) => [
            record.full_name,
            record.postcode.toUpperCase(),
            record.service,
            record.weight_kg,
            record.reference ?? '',
            record.notes,
            ai_flag,
        ]),
    ];
    return XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet(rows));
};
