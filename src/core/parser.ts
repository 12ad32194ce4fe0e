/**
 * Rule declaration parsing.
 * Declarations are parsed once per container type; registry lookup happens at validation.
 */

import type { RuleDeclaration, RuleSetDeclaration, RuleSpec, FieldRules, CompiledRuleSet } from './types.js';
import { toPascal } from './naming.js';
import { RuleSyntaxError } from './errors.js';

export const CUSTOM_RULE_LABEL = 'custom rule';

/**
 * Parse `name` or `name:arg1,arg2` into a named rule spec.
 * Only the first `:` separates the name; arguments are not trimmed.
 */
export function parseRuleSpec(declaration: RuleDeclaration): RuleSpec {
    if (typeof declaration === 'function') {
        return { kind: 'custom', predicate: declaration };
    }

    const sep = declaration.indexOf(':');
    const name = sep === -1 ? declaration : declaration.slice(0, sep);
    const args = sep === -1 ? [] : declaration.slice(sep + 1).split(',');

    if (name.trim() === '') {
        throw new RuleSyntaxError(declaration, 'missing rule name');
    }

    return { kind: 'named', name, args, source: declaration };
}

/**
 * Label a rule the way violations and lint issues report it.
 */
export function describeRule(spec: RuleSpec): string {
    return spec.kind === 'named' ? spec.name : CUSTOM_RULE_LABEL;
}

function isReserved(spec: RuleSpec, reserved: 'Required' | 'Nullable'): boolean {
    return spec.kind === 'named' && toPascal(spec.name) === reserved;
}

/**
 * Parse a field's declarations, lifting `required` and `nullable` into flags.
 */
export function compileFieldRules(field: string, declarations: readonly RuleDeclaration[]): FieldRules {
    const specs = declarations.map(parseRuleSpec);

    return {
        field,
        required: specs.some(spec => isReserved(spec, 'Required')),
        nullable: specs.some(spec => isReserved(spec, 'Nullable')),
        rules: specs.filter(spec => !isReserved(spec, 'Required') && !isReserved(spec, 'Nullable')),
    };
}

/**
 * Parse a whole rule declaration. Field order is kept.
 * @throws RuleSyntaxError on the first malformed rule string
 */
export function compileRuleSet(declaration: RuleSetDeclaration): CompiledRuleSet {
    return Object.entries(declaration).map(([field, rules]) => compileFieldRules(field, rules));
}
