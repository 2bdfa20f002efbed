import { MalformedNumberListError } from './errors.js';

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parses a colon separated list of unsigned integers such as `2:3:2`.
 * An empty string yields an empty list.
 */
export function parseNumberList(text: string, option: string): number[] {
    if (text === '') {
        return [];
    }
    return text.split(':').map(token => {
        if (!UNSIGNED_INTEGER.test(token)) {
            throw new MalformedNumberListError(option, text);
        }
        const value = Number(token);
        if (!Number.isSafeInteger(value)) {
            throw new MalformedNumberListError(option, text);
        }
        return value;
    });
}
