/**
 * Shared shapes of the container core: rule declarations and their compiled form,
 * violations, accessors, macros and construction options.
 */

import type { PropertyContainer } from '../container.js';
import type { RuleRegistry } from './rules.js';
import type { MacroRegistry } from './macros.js';

/**
 * Field name to value mapping, as supplied to fill() and returned by toMap().
 */
export type PropertyMap = Record<string, unknown>;

/**
 * A registered rule. Arguments are the raw strings from the rule declaration;
 * predicates coerce them as they need.
 */
export type RulePredicate = (value: unknown, args: readonly string[]) => boolean;

/**
 * An inline rule supplied as a function in a rule declaration.
 */
export type CustomRule = (value: unknown) => boolean;

/**
 * One entry of a field's rule list: `"name"`, `"name:arg1,arg2"` or a custom predicate.
 */
export type RuleDeclaration = string | CustomRule;

/**
 * Rule declaration of a container type, keyed by field name.
 */
export type RuleSetDeclaration = Record<string, readonly RuleDeclaration[]>;

/**
 * A parsed rule. `name` keeps the spelling used in the declaration;
 * `source` is the full declaration string.
 */
export type RuleSpec =
    | { kind: 'named'; name: string; args: string[]; source: string }
    | { kind: 'custom'; predicate: CustomRule };

/**
 * Rules of a single field after parsing.
 * `required` and `nullable` are lifted out of the rule list into flags.
 */
export interface FieldRules {
    field: string;
    required: boolean;
    nullable: boolean;
    rules: RuleSpec[];
}

export type CompiledRuleSet = readonly FieldRules[];

export type ViolationKind = 'required_violation' | 'rule_violation';

export interface Violation {
    kind: ViolationKind;
    field: string;
    /** Rule name as declared, `required`, or the custom rule label */
    rule: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    violations: Violation[];
}

/**
 * Computed accessors of a container type, keyed by the field they shadow.
 */
export type AccessorMap = Record<string, () => unknown>;

/**
 * A macro. The container it is invoked on is always the first argument.
 */
export type MacroFn = (container: PropertyContainer, ...args: unknown[]) => unknown;

/**
 * Registries a container validates and resolves against.
 * Omitted entries fall back to the process-wide defaults.
 */
export interface ContainerOptions {
    rules?: RuleRegistry;
    macros?: MacroRegistry;
}
