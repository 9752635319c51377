import { jsonrepair } from 'jsonrepair';

/**
 * Safely parses a JSON string, handling common LLM output issues.
 *
 * 1. Extracts JSON from Markdown code blocks or surrounding prose.
 * 2. Repairs common syntax errors (trailing commas, single quotes, comments, etc.) using `jsonrepair`.
 *
 * @param input The string containing JSON
 * @returns The parsed value or null if no structure could be recovered
 */
export function safeParseJSON(input: string): unknown {
    if (!input) {
        return null;
    }

    let candidate = input;

    // Outer-most object or array: first '{' / '[' to the matching last '}' / ']'
    const firstOpenBrace = input.indexOf('{');
    const firstOpenBracket = input.indexOf('[');

    let startIndex = -1;
    let endIndex = -1;

    if (firstOpenBrace !== -1 && (firstOpenBracket === -1 || firstOpenBrace < firstOpenBracket)) {
        startIndex = firstOpenBrace;
        endIndex = input.lastIndexOf('}') + 1;
    } else if (firstOpenBracket !== -1) {
        startIndex = firstOpenBracket;
        endIndex = input.lastIndexOf(']') + 1;
    }

    if (startIndex !== -1 && endIndex > startIndex) {
        candidate = input.substring(startIndex, endIndex);
    }

    try {
        return JSON.parse(candidate);
    } catch {
        // Fall through to repair
    }

    try {
        const result: unknown = JSON.parse(jsonrepair(candidate));
        // jsonrepair turns bare prose into a string literal; that is not structure
        if (typeof result === 'string') {
            return null;
        }
        return result;
    } catch {
        return null;
    }
}

/**
 * Narrowing helper for parsed JSON objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
