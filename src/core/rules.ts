/**
 * Built-in validation rules and the registry that resolves rule names.
 */

import type { RulePredicate } from './types.js';
import { isNil, isNumeric, toFloat, compareEqual, compareNumeric } from './operators.js';
import { parseDate, formatDate } from './temporal.js';
import { toPascal } from './naming.js';
import { PropertyContainerError, UnknownRuleError } from './errors.js';

const EMAIL = /^[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+)*@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Rule names that only decide whether a field is validated.
 * They have no predicate and are never looked up in a registry.
 */
export const RESERVED_RULES: ReadonlySet<string> = new Set(['Required', 'Nullable']);

// ============================================================
// Built-in rules
// ============================================================

export const BUILTIN_RULES: Readonly<Record<string, RulePredicate>> = {
    // === Type rules ===
    'Numeric': (value) => isNumeric(value),

    'Int': (value) => {
        if (typeof value === 'boolean') {
            return true;
        }
        const [num, ok] = toFloat(value);
        return ok && Number.isInteger(num);
    },

    'String': (value) => typeof value === 'string',

    // === Presence rules ===
    'NotNull': (value) => !isNil(value),

    'NotEmpty': (value) => !isNil(value) && value !== '',

    // === Date rules ===
    'Date': (value) => parseDate(value)[1],

    'DateFormat': (value, args) => {
        if (typeof value !== 'string' || args.length === 0) {
            return false;
        }
        const [date, ok] = parseDate(value);
        return ok && formatDate(date, args[0]) === value;
    },

    // === Format rules ===
    'Email': (value) => typeof value === 'string' && EMAIL.test(value),

    'Uuid': (value) => typeof value === 'string' && UUID.test(value),

    // === Set membership ===
    'In': (value, args) => args.some(allowed => compareEqual(value, allowed)),

    // === Numeric comparison ===
    'GreaterThan': (value, args) => compareNumeric(value, args[0], (a, b) => a > b),

    'GreaterThanEqual': (value, args) => compareNumeric(value, args[0], (a, b) => a >= b),

    'LessThan': (value, args) => compareNumeric(value, args[0], (a, b) => a < b),

    'LessThanEqual': (value, args) => compareNumeric(value, args[0], (a, b) => a <= b),
};

// ============================================================
// Registry
// ============================================================

/**
 * Catalog of named rule predicates.
 *
 * Names are stored PascalCased, so `date_format`, `dateFormat` and `DateFormat`
 * resolve to the same entry. Registration is a write to shared state: the
 * registry does no locking, and entries are never removed.
 */
export class RuleRegistry {
    private readonly predicates = new Map<string, RulePredicate>();

    constructor(entries: Readonly<Record<string, RulePredicate>> = {}) {
        for (const [name, predicate] of Object.entries(entries)) {
            this.register(name, predicate);
        }
    }

    /**
     * A registry holding the built-in rules.
     */
    static standard(): RuleRegistry {
        return new RuleRegistry(BUILTIN_RULES);
    }

    /**
     * Add a rule, replacing any rule registered under the same normalized name.
     */
    register(name: string, predicate: RulePredicate): this {
        const key = toPascal(name);
        if (RESERVED_RULES.has(key)) {
            throw new PropertyContainerError('reserved_rule', `'${name}' is a reserved rule name`);
        }
        this.predicates.set(key, predicate);
        return this;
    }

    has(name: string): boolean {
        return this.predicates.has(toPascal(name));
    }

    /**
     * Look up a rule by name.
     * @throws UnknownRuleError if nothing is registered under the name
     */
    resolve(name: string, field?: string): RulePredicate {
        const predicate = this.predicates.get(toPascal(name));
        if (!predicate) {
            throw new UnknownRuleError(name, field);
        }
        return predicate;
    }

    /**
     * Normalized names of all registered rules.
     */
    names(): string[] {
        return [...this.predicates.keys()];
    }
}

/**
 * Process-wide registry used by containers that are not given one.
 * Lives until process exit.
 */
export const defaultRules = RuleRegistry.standard();
