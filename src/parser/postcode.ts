import { cleanLine } from './text';

const POSTCODE_SOURCE = '\\b(GIR\\s?0AA|[A-Z]{1,2}\\d[A-Z\\d]?\\s*\\d[A-Z]{2})\\b';
const COMPACT_POSTCODE = /^[A-Z]{1,2}\d[A-Z\d]?\d[A-Z]{2}$/;

const compact = (value: string): string => value.replace(/[^A-Za-z0-9]/g, '').toUpperCase();

export const isProbablyUkPostcode = (value: string): boolean => {
    if (!value) return false;
    const packed = compact(value);
    return packed === 'GIR0AA' || COMPACT_POSTCODE.test(packed);
};

/** `ab538hy` → `AB53 8HY`; an empty string when the value is not a UK postcode. */
export const normalizeUkPostcode = (value: string): string => {
    if (!isProbablyUkPostcode(value)) return '';
    const packed = compact(value);
    if (packed === 'GIR0AA') return 'GIR 0AA';
    return `${packed.slice(0, -3)} ${packed.slice(-3)}`;
};

/**
 * Pulls a postcode out of a line. Returns what is left of the line and the
 * normalised postcode, which is empty when none was found.
 */
export const extractPostcode = (line: string): { remaining: string; postcode: string } => {
    const found = new RegExp(POSTCODE_SOURCE, 'i').exec(line);
    if (!found) {
        return { remaining: line, postcode: '' };
    }
    return {
        remaining: cleanLine(line.replace(new RegExp(POSTCODE_SOURCE, 'gi'), ' ')),
        postcode: normalizeUkPostcode(found[1]),
    };
};
