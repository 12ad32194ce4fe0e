/**
 * Static linter for rule declarations.
 * Analyzes a declaration without any data, catching unknown rules,
 * malformed rule strings, missing arguments and rules that can never pass.
 */

import type { RuleSetDeclaration, RuleDeclaration, RuleSpec } from './types.js';
import { defaultRules, RESERVED_RULES } from './rules.js';
import type { RuleRegistry } from './rules.js';
import { parseRuleSpec } from './parser.js';
import { isNumeric } from './operators.js';
import { toPascal } from './naming.js';
import { RuleSyntaxError } from './errors.js';

// ============================================================
// Public types
// ============================================================

export type LintSeverity = 'error' | 'warning';

export type LintCode =
    | 'rule_syntax'
    | 'unknown_rule'
    | 'missing_argument'
    | 'non_numeric_bound'
    | 'extra_arguments'
    | 'duplicate_rule'
    | 'nullable_not_null';

export interface LintIssue {
    severity: LintSeverity;
    code: LintCode;
    message: string;
    field: string;
    rule?: string;
}

export interface LintResult {
    valid: boolean;
    issues: LintIssue[];
}

// ============================================================
// Internal types
// ============================================================

interface LintContext {
    registry: RuleRegistry;
    issues: LintIssue[];
}

type NamedSpec = Extract<RuleSpec, { kind: 'named' }>;

// ============================================================
// Constants
// ============================================================

/** Built-ins that take no arguments */
const NO_ARGS: ReadonlySet<string> = new Set([
    'Numeric', 'Int', 'NotNull', 'NotEmpty', 'Date', 'String', 'Email', 'Uuid',
    ...RESERVED_RULES,
]);

const COMPARISONS: ReadonlySet<string> = new Set([
    'GreaterThan', 'GreaterThanEqual', 'LessThan', 'LessThanEqual',
]);

/** Built-ins that take exactly one argument */
const ONE_ARG: ReadonlySet<string> = new Set(['DateFormat', ...COMPARISONS]);

// ============================================================
// Entry point
// ============================================================

/**
 * Lint a rule declaration against a registry.
 * `valid` is false when any issue is an error; warnings alone keep it true.
 */
export function lintRules(declaration: RuleSetDeclaration, registry: RuleRegistry = defaultRules): LintResult {
    const ctx: LintContext = { registry, issues: [] };

    for (const [field, declarations] of Object.entries(declaration)) {
        lintField(ctx, field, declarations);
    }

    return {
        valid: !ctx.issues.some(issue => issue.severity === 'error'),
        issues: ctx.issues,
    };
}

// ============================================================
// Field checks
// ============================================================

function lintField(ctx: LintContext, field: string, declarations: readonly RuleDeclaration[]): void {
    const seen = new Set<string>();
    const names = new Set<string>();

    for (const declaration of declarations) {
        const spec = tryParse(ctx, field, declaration);
        if (!spec || spec.kind === 'custom') {
            continue;
        }

        const key = toPascal(spec.name);
        names.add(key);

        const signature = `${key}:${spec.args.join(',')}`;
        if (seen.has(signature)) {
            addIssue(ctx, 'warning', 'duplicate_rule', field, spec.name,
                `Rule '${spec.source}' appears more than once on field '${field}'`);
        }
        seen.add(signature);

        lintRule(ctx, field, spec, key);
    }

    if (names.has('Nullable') && (names.has('NotNull') || names.has('NotEmpty'))) {
        addIssue(ctx, 'warning', 'nullable_not_null', field, undefined,
            `Field '${field}' is nullable, so null never reaches its notNull/notEmpty rule`);
    }
}

function tryParse(ctx: LintContext, field: string, declaration: RuleDeclaration): RuleSpec | undefined {
    try {
        return parseRuleSpec(declaration);
    } catch (e) {
        if (!(e instanceof RuleSyntaxError)) {
            throw e;
        }
        addIssue(ctx, 'error', 'rule_syntax', field, e.source, e.message);
        return undefined;
    }
}

function lintRule(ctx: LintContext, field: string, spec: NamedSpec, key: string): void {
    if (!RESERVED_RULES.has(key) && !ctx.registry.has(spec.name)) {
        addIssue(ctx, 'error', 'unknown_rule', field, spec.name,
            `Field '${field}' uses unknown rule '${spec.name}'`);
        return;
    }

    const count = spec.args.length;

    if (NO_ARGS.has(key) && count > 0) {
        addIssue(ctx, 'warning', 'extra_arguments', field, spec.name,
            `Rule '${spec.name}' takes no arguments but was given ${count}`);
    }

    if (ONE_ARG.has(key)) {
        if (count === 0) {
            addIssue(ctx, 'error', 'missing_argument', field, spec.name,
                `Rule '${spec.name}' on field '${field}' needs an argument`);
            return;
        }
        if (count > 1) {
            addIssue(ctx, 'warning', 'extra_arguments', field, spec.name,
                `Rule '${spec.name}' takes 1 argument but was given ${count}`);
        }
    }

    if (key === 'In' && count === 0) {
        addIssue(ctx, 'error', 'missing_argument', field, spec.name,
            `Rule '${spec.name}' on field '${field}' needs a list of allowed values`);
    }

    if (COMPARISONS.has(key) && !isNumeric(spec.args[0])) {
        addIssue(ctx, 'warning', 'non_numeric_bound', field, spec.name,
            `Rule '${spec.source}' compares against a non-numeric bound and can never pass`);
    }
}

// Helper functions

function addIssue(
    ctx: LintContext,
    severity: LintSeverity,
    code: LintCode,
    field: string,
    rule: string | undefined,
    message: string
): void {
    const issue: LintIssue = { severity, code, message, field };
    if (rule !== undefined) {
        issue.rule = rule;
    }
    ctx.issues.push(issue);
}
