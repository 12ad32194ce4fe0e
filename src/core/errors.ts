/**
 * Errors raised by containers and their registries.
 * Each carries a machine-parseable `code`; callers should branch on it, not on the message.
 */

import type { Violation } from './types.js';

export type ErrorCode =
    | 'validation_failed'
    | 'unknown_rule'
    | 'unknown_method'
    | 'rule_syntax'
    | 'reserved_rule'
    | 'date_coercion';

export class PropertyContainerError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * A field failed its required check or one of its rules.
 */
export class PropertyValidationError extends PropertyContainerError {
    readonly violation: Violation;

    constructor(violation: Violation) {
        super('validation_failed', violation.message);
        this.violation = violation;
    }

    get field(): string {
        return this.violation.field;
    }

    get rule(): string {
        return this.violation.rule;
    }
}

/**
 * A rule declaration names a rule the registry does not know.
 * This is a configuration error, not a problem with the data.
 */
export class UnknownRuleError extends PropertyContainerError {
    readonly rule: string;
    readonly field?: string;

    constructor(rule: string, field?: string) {
        super('unknown_rule', `No such rule: ${rule}`);
        this.rule = rule;
        this.field = field;
    }
}

/**
 * A dispatched call names neither a method nor a registered macro.
 */
export class UnknownMethodError extends PropertyContainerError {
    readonly method: string;
    readonly containerType: string;

    constructor(method: string, containerType: string) {
        super('unknown_method', `${method} does not exist as a method or a macro on ${containerType}.`);
        this.method = method;
        this.containerType = containerType;
    }
}

export class RuleSyntaxError extends PropertyContainerError {
    readonly source: string;

    constructor(source: string, reason: string) {
        super('rule_syntax', `Invalid rule '${source}': ${reason}`);
        this.source = source;
    }
}

/**
 * A declared date field holds a value that does not parse as a date.
 */
export class DateCoercionError extends PropertyContainerError {
    readonly field: string;

    constructor(field: string, value: unknown) {
        super('date_coercion', `Property '${field}' holds ${JSON.stringify(value) ?? String(value)}, which is not a date`);
        this.field = field;
    }
}
