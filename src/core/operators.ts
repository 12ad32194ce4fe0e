/**
 * Value helpers for the built-in rules.
 * All helpers are nil-safe: null and undefined never count as numeric or equal to a value.
 */

const NUMERIC_STRING = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * True for null and undefined.
 */
export function isNil(v: unknown): v is null | undefined {
    return v === null || v === undefined;
}

/**
 * A number other than NaN, or a string that reads as one in full.
 */
export function isNumeric(v: unknown): v is number | string {
    if (typeof v === 'number') {
        return !Number.isNaN(v);
    }
    if (typeof v === 'string') {
        return NUMERIC_STRING.test(v);
    }
    return false;
}

/**
 * Convert a value to a number if possible.
 * Unlike Number(), blank strings and booleans are rejected.
 */
export function toFloat(v: unknown): [number, boolean] {
    if (!isNumeric(v)) {
        return [0, false];
    }
    return [typeof v === 'number' ? v : Number(v), true];
}

/**
 * Truthiness of a scalar: false, 0, '', '0' and nil are false.
 */
function truthy(v: unknown): boolean {
    return !(isNil(v) || v === false || v === 0 || v === '' || v === '0');
}

/**
 * Loose equality as used by the `in` rule.
 * Nil only equals nil. A boolean on either side compares by truthiness,
 * two numerics compare as numbers, anything else compares as text.
 */
export function compareEqual(a: unknown, b: unknown): boolean {
    if (isNil(a) || isNil(b)) {
        return isNil(a) && isNil(b);
    }
    if (typeof a === 'boolean' || typeof b === 'boolean') {
        return truthy(a) === truthy(b);
    }

    const [aNum, aOk] = toFloat(a);
    const [bNum, bOk] = toFloat(b);
    return aOk && bOk ? aNum === bNum : String(a) === String(b);
}

/**
 * Compare two values numerically. Non-numeric operands always compare false.
 */
export function compareNumeric(a: unknown, b: unknown, test: (a: number, b: number) => boolean): boolean {
    const [aNum, aOk] = toFloat(a);
    const [bNum, bOk] = toFloat(b);
    return aOk && bOk && test(aNum, bNum);
}
