/**
 * Field validation against a compiled rule set.
 * Decides whether a field applies, then runs its rules in declaration order.
 */

import type { PropertyMap, FieldRules, CompiledRuleSet, Violation, ViolationKind, ValidationResult } from './types.js';
import type { RuleRegistry } from './rules.js';
import { isNil } from './operators.js';
import { describeRule } from './parser.js';

export type Applicability = 'skip' | 'missing' | 'evaluate';

/**
 * Build a violation with the standard message.
 */
export function makeViolation(kind: ViolationKind, field: string, rule: string): Violation {
    return {
        kind,
        field,
        rule,
        message: `[${field}] failed validation rule [${rule}]`,
    };
}

/**
 * Decide whether a field is validated.
 *
 * Absent fields are only checked when required, and `nullable` exempts them.
 * A present null is skipped when nullable; otherwise it goes through the rules
 * like any other value.
 */
export function checkApplicability(rules: FieldRules, data: PropertyMap): Applicability {
    if (!Object.hasOwn(data, rules.field)) {
        return rules.required && !rules.nullable ? 'missing' : 'skip';
    }
    if (rules.nullable && isNil(data[rules.field])) {
        return 'skip';
    }
    return 'evaluate';
}

/** A rule with its predicate looked up, ready to run */
interface BoundRule {
    label: string;
    test: (value: unknown) => boolean;
}

/**
 * Look up every named rule of a field in the registry.
 * @throws UnknownRuleError if a named rule is not registered
 */
function bindRules(rules: FieldRules, registry: RuleRegistry): BoundRule[] {
    return rules.rules.map((spec): BoundRule => {
        if (spec.kind === 'custom') {
            return { label: describeRule(spec), test: spec.predicate };
        }
        const predicate = registry.resolve(spec.name, rules.field);
        return { label: describeRule(spec), test: (value) => predicate(value, spec.args) };
    });
}

function evaluateField(rules: FieldRules, bound: readonly BoundRule[], data: PropertyMap): Violation | undefined {
    const applicability = checkApplicability(rules, data);

    if (applicability === 'skip') {
        return undefined;
    }
    if (applicability === 'missing') {
        return makeViolation('required_violation', rules.field, 'required');
    }

    const value = data[rules.field];
    const failed = bound.find(rule => !rule.test(value));
    return failed ? makeViolation('rule_violation', rules.field, failed.label) : undefined;
}

/**
 * Validate one field of the incoming data.
 * Every named rule is resolved first, then the rules run in order up to the first failure.
 *
 * @returns The violation, or undefined if the field passes or is skipped
 * @throws UnknownRuleError if a named rule is not registered, whatever the data
 */
export function validateField(rules: FieldRules, data: PropertyMap, registry: RuleRegistry): Violation | undefined {
    return evaluateField(rules, bindRules(rules, registry), data);
}

/**
 * Validate data against every declared field, stopping at the first failing field.
 * Rule names of all fields are resolved before any value is checked.
 */
export function validateData(ruleSet: CompiledRuleSet, data: PropertyMap, registry: RuleRegistry): ValidationResult {
    const bound = ruleSet.map(rules => bindRules(rules, registry));
    for (const [i, rules] of ruleSet.entries()) {
        const violation = evaluateField(rules, bound[i], data);
        if (violation) {
            return { valid: false, violations: [violation] };
        }
    }
    return { valid: true, violations: [] };
}

/**
 * Validate data against every declared field and report all failing fields,
 * one violation each, in declaration order.
 */
export function collectViolations(ruleSet: CompiledRuleSet, data: PropertyMap, registry: RuleRegistry): Violation[] {
    const bound = ruleSet.map(rules => bindRules(rules, registry));
    const violations: Violation[] = [];
    for (const [i, rules] of ruleSet.entries()) {
        const violation = evaluateField(rules, bound[i], data);
        if (violation) {
            violations.push(violation);
        }
    }
    return violations;
}
