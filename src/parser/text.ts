/**
 * Line cleanup and casing for pasted address text.
 */

const ACRONYMS = new Set(['PO', 'UK', 'GB', 'EU', 'USA', 'BFPO']);

// Control, format and private-use characters, plus emoji and other symbols
const INVISIBLE_OR_SYMBOL = /[\p{C}\p{So}]/gu;
const EDGE_PUNCTUATION = /^[\s,.]+|[\s,.]+$/g;
const LETTERS_ONLY = /^\p{L}+$/u;

export const cleanLine = (line: string): string => {
    if (!line) return '';
    return line
        .replace(/\t/g, ' ')
        .replace(INVISIBLE_OR_SYMBOL, '')
        .replace(/\s+/g, ' ')
        .replace(EDGE_PUNCTUATION, '');
};

export const splitOnCommas = (line: string): string[] =>
    line.split(',').map(cleanLine).filter(part => part.length > 0);

const capitalize = (word: string): string =>
    word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

const normalizeWord = (word: string): string => {
    if (!word) return word;
    const upper = word.toUpperCase();
    if (ACRONYMS.has(upper)) return upper;
    if (/\d/.test(word)) return upper;
    // Initials stay capitals; so do short words the sender already typed in capitals
    if (LETTERS_ONLY.test(word) && (word.length === 1 || (word.length === 2 && word === upper))) {
        return upper;
    }
    return capitalize(word);
};

const normalizeApostrophes = (token: string): string => {
    const parts = token.split('\'');
    return parts.map((part, index) => {
        if (index === 0) return normalizeWord(part);
        // O'Neil keeps its capital, Queen's does not
        return parts[index - 1].length === 1 ? normalizeWord(part) : part.toLowerCase();
    }).join('\'');
};

const normalizeToken = (token: string): string => {
    if (token.includes('-')) {
        return token.split('-').map(part => part.includes('\'') ? normalizeApostrophes(part) : normalizeWord(part)).join('-');
    }
    if (token.includes('\'')) {
        return normalizeApostrophes(token);
    }
    return normalizeWord(token);
};

/** Title-cases text while keeping acronyms, initials and alphanumerics upper-case. */
export const normalizeCase = (text: string): string =>
    cleanLine(text).split(' ').filter(Boolean).map(normalizeToken).join(' ');
