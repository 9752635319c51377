/**
 * Text normalization for the PDF renderer.
 *
 * The report uses the PDF standard fonts, which only encode WinAnsi
 * (printable ASCII plus Latin-1). Typographic punctuation is mapped to ASCII
 * and everything else outside that range (emoji, CJK, symbols) is dropped.
 */

const REPLACEMENTS: [RegExp, string][] = [
    [/[—–‒‐−]/g, '-'],
    [/[‘’‚′]/g, "'"],
    [/[“”„″]/g, '"'],
    [/…/g, '...'],
    [/[•·]/g, '-'],
    [/[\u00A0\u2000-\u200A\u202F]/g, ' ']
];

// Anything not printable ASCII, Latin-1 or a newline
const NON_ENCODABLE = /[^\n\x20-\x7E\xA1-\xFF]/g;

export function toPdfSafeText(text: string | null | undefined): string {
    if (!text) return '';

    let result = text;
    for (const [pattern, replacement] of REPLACEMENTS) {
        result = result.replace(pattern, replacement);
    }

    return result
        .replace(NON_ENCODABLE, '')
        .split('\n')
        .map(line => line.replace(/[ \t]+/g, ' ').trim())
        .filter(line => line.length > 0)
        .join('\n');
}

// Terminal punctuation followed by a capitalized word, or at the end of the text
const SENTENCE_END = /[.!?]+(?=\s+["'(]?[A-Z]|\s*$)/g;

const ABBREVIATIONS = new Set(['mr', 'mrs', 'ms', 'dr', 'st', 'jr', 'sr', 'vs', 'no', 'gov', 'sen', 'rep', 'hon', 'atty', 'engr', 'brgy']);

/**
 * True when the text before a period ends in an initial ("U.S", "J") or a
 * known title abbreviation ("Mr", "Dr"), so the period does not end a sentence.
 */
function endsWithAbbreviation(before: string): boolean {
    const word = /(\S+)$/.exec(before)?.[1] ?? '';
    const lastPart = word.split('.').pop()?.replace(/^["'(]+/, '') ?? '';
    return /^[A-Z]$/.test(lastPart) || ABBREVIATIONS.has(lastPart.toLowerCase());
}

export function splitSentences(text: string): string[] {
    const sentences: string[] = [];
    const pattern = new RegExp(SENTENCE_END.source, 'g');
    let start = 0;
    let match: RegExpExecArray | null;

    while ((match = pattern.exec(text)) !== null) {
        const end = match.index + match[0].length;
        const atEnd = text.slice(end).trim().length === 0;
        if (!atEnd && match[0] === '.' && endsWithAbbreviation(text.slice(start, match.index))) {
            continue;
        }
        sentences.push(text.slice(start, end).trim());
        start = end;
    }
    sentences.push(text.slice(start).trim());

    return sentences.filter(s => s.length > 0);
}

export function limitSentences(text: string, max: number): string {
    return splitSentences(text).slice(0, max).join(' ');
}

export const SUMMARY_PREFIX = 'This post is';

/**
 * Every summary reads "This post is ..." so the report scans uniformly.
 */
export function ensureSummaryPrefix(summary: string): string {
    const trimmed = summary.trim();
    if (!trimmed) {
        return `${SUMMARY_PREFIX} about the content shown in the screenshot.`;
    }
    if (trimmed.toLowerCase().startsWith(SUMMARY_PREFIX.toLowerCase())) {
        return trimmed;
    }
    return `${SUMMARY_PREFIX} about: ${trimmed}`;
}
