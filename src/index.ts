/**
 * property-container - property bags with declared validation rules,
 * computed accessors and runtime macros.
 */

export { PropertyContainer } from './container.js';

export { RuleRegistry, defaultRules, BUILTIN_RULES } from './core/rules.js';
export { MacroRegistry, globalMacros } from './core/macros.js';
export { PropertyStore } from './core/store.js';

export { parseRuleSpec, compileRuleSet, compileFieldRules, describeRule, CUSTOM_RULE_LABEL } from './core/parser.js';
export { validateField, validateData, collectViolations, checkApplicability } from './core/validate.js';
export type { Applicability } from './core/validate.js';
export { resolveProperty, indexAccessors } from './core/resolver.js';
export type { ResolutionContext, AccessorIndex } from './core/resolver.js';

export { parseDate, formatDate } from './core/temporal.js';
export { toPascal, accessorName } from './core/naming.js';

export { lintRules } from './core/lint.js';
export type { LintIssue, LintResult, LintSeverity, LintCode } from './core/lint.js';

export {
    PropertyContainerError,
    PropertyValidationError,
    UnknownRuleError,
    UnknownMethodError,
    RuleSyntaxError,
    DateCoercionError,
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';

export type {
    PropertyMap,
    RulePredicate,
    CustomRule,
    RuleDeclaration,
    RuleSetDeclaration,
    RuleSpec,
    FieldRules,
    CompiledRuleSet,
    Violation,
    ViolationKind,
    ValidationResult,
    AccessorMap,
    MacroFn,
    ContainerOptions,
} from './core/types.js';
