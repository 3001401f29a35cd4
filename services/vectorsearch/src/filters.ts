import { RequestValidationError } from '@cookbook/shared';

// Characters the search query syntax treats as operators or separators
const SPECIAL_CHARACTERS = /[,.<>{}[\]"':;!@#$%^&*()\-+=~|/\\\s]/g;
const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function escapeQueryValue(value: string): string {
    return value.replace(SPECIAL_CHARACTERS, '\\$&');
}

function checkField(field: string): void {
    if (!FIELD_NAME.test(field)) {
        throw new RequestValidationError(`Invalid field name '${field}'`, 'filter');
    }
}

/**
 * Exact phrase match on a TEXT field.
 */
export function textFilter(field: string, phrase: string): string {
    checkField(field);
    if (phrase.trim() === '') {
        throw new RequestValidationError(`Text filter on ${field} needs a phrase`, 'filter');
    }
    return `@${field}:"${phrase.replace(/["\\]/g, '\\$&')}"`;
}

/**
 * Matches documents whose TAG field holds any of the values.
 */
export function tagFilter(field: string, values: string[]): string {
    checkField(field);
    if (values.length === 0) {
        throw new RequestValidationError(`Tag filter on ${field} needs at least one value`, 'filter');
    }
    return `@${field}:{${values.map(escapeQueryValue).join(' | ')}}`;
}

/**
 * Inclusive range on a NUMERIC field; an omitted bound is open.
 */
export function numericFilter(field: string, min?: number, max?: number): string {
    checkField(field);
    if (min !== undefined && max !== undefined && min > max) {
        throw new RequestValidationError(`Numeric filter on ${field} has min ${min} above max ${max}`, 'filter');
    }
    return `@${field}:[${min ?? '-inf'} ${max ?? '+inf'}]`;
}

/** All predicates must hold */
export function allOf(...filters: string[]): string {
    return filters.join(' ');
}
