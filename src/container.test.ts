/**
 * Tests for PropertyContainer.
 * Organized into: Storage, Accessors and macros, Validation, Dates, Export and merge.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    PropertyContainer,
    MacroRegistry,
    RuleRegistry,
    PropertyValidationError,
    UnknownRuleError,
} from './index.js';
import type { RuleSetDeclaration, AccessorMap } from './index.js';

class Example extends PropertyContainer {
    protected override rules(): RuleSetDeclaration {
        return {
            some_required_property: ['required'],
            some_not_null_property: ['notNull'],
            some_integer_property: ['int'],
            some_numeric_property: ['numeric'],
            some_date_property: ['date'],
            some_date_format_property: ['date_format:Y-m-d'],
            some_required_nullable_string_property: ['required', 'nullable', 'string'],
            some_email_property: ['email'],
            some_in_rule_strings: ['in:a,b,c'],
            some_in_rule_int: ['in:1,2,3'],
        };
    }

    protected override dates(): readonly string[] {
        return ['test_date'];
    }

    protected override accessors(): AccessorMap {
        return {
            some_mutator: () => 'value_of_the_mutator',
        };
    }
}

// Helper: build a valid Example with extra fields
function example(extra: Record<string, unknown> = {}): Example {
    return Example.make({ some_required_property: 'needed', ...extra });
}

// Helper: assert construction fails on a given field and rule
function expectViolation(fn: () => unknown, field: string, rule: string) {
    assert.throws(fn, (err: unknown) => {
        assert.ok(err instanceof PropertyValidationError, `Expected PropertyValidationError, got ${String(err)}`);
        assert.strictEqual(err.field, field);
        assert.strictEqual(err.rule, rule);
        assert.strictEqual(err.message, `[${field}] failed validation rule [${rule}]`);
        return true;
    });
}

// ===========================================================================
// Storage
// ===========================================================================

describe('Storage', () => {
    it('contains the properties it was made with', () => {
        const container = PropertyContainer.make({
            a_property: 'a_value',
            another_property: 'another_value',
        });

        assert.ok(container instanceof PropertyContainer);
        assert.strictEqual(container.get('a_property'), 'a_value');
        assert.strictEqual(container.get('another_property'), 'another_value');
    });

    it('constructor and make() behave the same', () => {
        const made = Example.make({ some_required_property: 'x' });
        const constructed = new Example({ some_required_property: 'x' });

        assert.ok(made instanceof Example);
        assert.deepStrictEqual(made.toMap(), constructed.toMap());
    });

    it('returns null for a property that was never set', () => {
        const container = PropertyContainer.make({ some_property: 'some_value' });
        assert.strictEqual(container.get('some_other_property'), null);
    });

    it('sets new properties and chains', () => {
        const container = PropertyContainer.make({ some_property: 'some_value' });

        const returned = container.set('some_other_property', 'some_other_value');

        assert.strictEqual(returned, container);
        assert.strictEqual(container.get('some_other_property'), 'some_other_value');
    });

    it('forgets properties, and forgetting twice is harmless', () => {
        const container = PropertyContainer.make({ some_property: 'some_value', kept: 1 });

        container.forget('some_property');
        container.forget('some_property');

        assert.strictEqual(container.get('some_property'), null);
        assert.deepStrictEqual(container.toMap(), { kept: 1 });
    });

    it('has() is false for null values and doesNotHave() is its negation', () => {
        const container = PropertyContainer.make({ empty: null, zero: 0, blank: '' });

        assert.strictEqual(container.has('empty'), false);
        assert.strictEqual(container.doesNotHave('empty'), true);
        assert.strictEqual(container.has('zero'), true);
        assert.strictEqual(container.has('blank'), true);
        assert.strictEqual(container.has('missing'), false);
    });

    it('forget() removes a null-valued entry too', () => {
        const container = PropertyContainer.make({ empty: null });

        container.forget('empty');

        assert.deepStrictEqual(container.toMap(), {});
    });

    it('exposes a property-style view', () => {
        const container = PropertyContainer.make({ some_property: 'some_value' });
        const view = container.fields();

        assert.strictEqual(view.some_property, 'some_value');
        assert.strictEqual(view.missing, null);

        view.some_other_property = 'assigned';
        assert.strictEqual(container.get('some_other_property'), 'assigned');
        assert.strictEqual('some_other_property' in view, true);

        delete view.some_property;
        assert.strictEqual(container.has('some_property'), false);
    });
});

// ===========================================================================
// Accessors and macros
// ===========================================================================

describe('Accessors and macros', () => {
    it('answers reads from a computed accessor', () => {
        assert.strictEqual(example().get('some_mutator'), 'value_of_the_mutator');
    });

    it('accessor takes precedence over a stored property', () => {
        const container = example({ some_mutator: 'some_value' });

        assert.strictEqual(container.get('some_mutator'), 'value_of_the_mutator');
        assert.strictEqual(container.raw('some_mutator'), 'some_value');
        assert.strictEqual(container.toMap().some_mutator, 'some_value');
    });

    it('call() fails for an unknown method until a macro is registered', () => {
        const macros = new MacroRegistry();
        const container = PropertyContainer.make({ some_property: 'some_value' }, { macros });

        assert.throws(() => container.call('thisMethodDoesNotExist'), {
            name: 'UnknownMethodError',
            code: 'unknown_method',
            message: 'thisMethodDoesNotExist does not exist as a method or a macro on PropertyContainer.',
        });

        macros.register('thisMethodDoesNotExist', () => 'Now it actually does exist');

        assert.strictEqual(container.call('thisMethodDoesNotExist'), 'Now it actually does exist');
    });

    it('names the concrete type in an unknown method error', () => {
        const container = Example.make({ some_required_property: 'x' }, { macros: new MacroRegistry() });

        assert.throws(() => container.call('nope'), {
            method: 'nope',
            containerType: 'Example',
        });
    });

    it('passes the container as the first macro argument', () => {
        const macros = new MacroRegistry();
        macros.register('shout', (container, suffix) => `${String(container.get('word'))}${String(suffix)}`);
        const container = PropertyContainer.make({ word: 'hello' }, { macros });

        assert.strictEqual(container.call('shout', '!'), 'hello!');
    });

    it('knows if a macro exists', () => {
        const macros = new MacroRegistry();
        const container = PropertyContainer.make({}, { macros });

        assert.strictEqual(container.hasMacro('someMacroMethod'), false);
        macros.register('someMacroMethod', () => 'someMacroMethod');
        assert.strictEqual(container.hasMacro('someMacroMethod'), true);
    });

    it('macro() registers on the process-wide registry', () => {
        const container = PropertyContainer.make({ n: 2 });

        PropertyContainer.macro('doubledForContainerTest', (c) => Number(c.get('n')) * 2);

        assert.strictEqual(container.hasMacro('doubledForContainerTest'), true);
        assert.strictEqual(container.call('doubledForContainerTest'), 4);
    });

    it('a macro named like an accessor answers get()', () => {
        const macros = new MacroRegistry();
        macros.register('getFullName', (c) => `${String(c.get('first'))} ${String(c.get('last'))}`);
        const container = PropertyContainer.make({ first: 'Ada', last: 'Example' }, { macros });

        assert.strictEqual(container.get('full_name'), 'Ada Example');
    });

    it('call() reaches accessors by accessor name and declared methods', () => {
        const container = example({ some_integer_property: 7 });

        assert.strictEqual(container.call('getSomeMutator'), 'value_of_the_mutator');
        assert.strictEqual(container.call('get', 'some_integer_property'), 7);
    });

    it('call() prefers a declared method over a macro of the same name', () => {
        const macros = new MacroRegistry();
        macros.register('toJson', () => 'macro');
        const container = PropertyContainer.make({ a: 1 }, { macros });

        assert.strictEqual(container.call('toJson'), '{"a":1}');
    });
});

// ===========================================================================
// Validation
// ===========================================================================

describe('Validation', () => {
    it('knows if properties are required', () => {
        expectViolation(() => Example.make({ some_property: 'some_value' }), 'some_required_property', 'required');
    });

    it('accepts valid fields', () => {
        const container = new Example({
            some_required_property: 'some random value',
            some_not_null_property: 0,
            some_integer_property: 100,
            some_numeric_property: '12.52',
            some_date_property: '2021-01-01 01:00:00',
        });

        assert.strictEqual(container.get('some_numeric_property'), '12.52');
    });

    it('fails null validation', () => {
        expectViolation(() => example({ some_not_null_property: null }), 'some_not_null_property', 'notNull');
    });

    it('fails integer validation', () => {
        expectViolation(() => example({ some_integer_property: 125.25 }), 'some_integer_property', 'int');
    });

    it('fails numeric validation', () => {
        expectViolation(() => example({ some_numeric_property: ['123', 'abc'] }), 'some_numeric_property', 'numeric');
        expectViolation(() => example({ some_numeric_property: 'Not a date' }), 'some_numeric_property', 'numeric');
    });

    it('fails date validation', () => {
        expectViolation(() => example({ some_date_property: '2021-13-45' }), 'some_date_property', 'date');
    });

    it('accepts null or nothing for a nullable required string', () => {
        assert.doesNotThrow(() => example({ some_required_nullable_string_property: null }));
        assert.doesNotThrow(() => example());
        assert.doesNotThrow(() => example({ some_required_nullable_string_property: 'some string' }));
    });

    it('rejects an int for a nullable required string', () => {
        expectViolation(
            () => example({ some_required_nullable_string_property: 123 }),
            'some_required_nullable_string_property',
            'string'
        );
    });

    it('checks emails', () => {
        assert.doesNotThrow(() => example({ some_email_property: 'testing@email.com' }));
        expectViolation(() => example({ some_email_property: 'testingemail.com' }), 'some_email_property', 'email');
    });

    it('checks date formats strictly', () => {
        assert.doesNotThrow(() => example({ some_date_format_property: '2021-10-01' }));
        expectViolation(
            () => example({ some_date_format_property: '01-10-2021' }),
            'some_date_format_property',
            'date_format'
        );
    });

    it('checks in-rules against strings and numbers', () => {
        assert.doesNotThrow(() => example({ some_in_rule_strings: 'a' }));
        expectViolation(() => example({ some_in_rule_strings: 'd' }), 'some_in_rule_strings', 'in');
        assert.doesNotThrow(() => example({ some_in_rule_int: 1 }));
        expectViolation(() => example({ some_in_rule_int: 4 }), 'some_in_rule_int', 'in');
    });

    it('stores undeclared fields without validation', () => {
        const container = example({ anything: { nested: [1, 2] } });
        assert.deepStrictEqual(container.get('anything'), { nested: [1, 2] });
    });

    it('leaves the store untouched when fill() fails', () => {
        const container = example();

        assert.throws(() => container.fill({
            some_required_property: 'replaced',
            some_integer_property: 'abc',
            extra: 1,
        }), PropertyValidationError);

        assert.strictEqual(container.get('some_required_property'), 'needed');
        assert.strictEqual(container.has('extra'), false);
    });

    it('set() bypasses validation', () => {
        const container = example().set('some_integer_property', 'not an int');
        assert.strictEqual(container.get('some_integer_property'), 'not an int');
    });

    it('check() reports every failing field without storing anything', () => {
        const container = example();

        const result = container.check({ some_integer_property: 1.5, some_email_property: 'nope' });

        assert.strictEqual(result.valid, false);
        assert.deepStrictEqual(
            result.violations.map(v => [v.field, v.rule, v.kind]),
            [
                ['some_required_property', 'required', 'required_violation'],
                ['some_integer_property', 'int', 'rule_violation'],
                ['some_email_property', 'email', 'rule_violation'],
            ]
        );
        assert.strictEqual(container.has('some_email_property'), false);
    });

    it('surfaces unknown rules as configuration errors', () => {
        class Broken extends PropertyContainer {
            protected override rules(): RuleSetDeclaration {
                return { code: ['no_such_rule'] };
            }
        }

        assert.throws(() => Broken.make({ code: 'x' }), (err: unknown) => {
            assert.ok(err instanceof UnknownRuleError);
            assert.strictEqual(err.rule, 'no_such_rule');
            assert.strictEqual(err.field, 'code');
            assert.strictEqual(err.message, 'No such rule: no_such_rule');
            return true;
        });
        assert.throws(() => Broken.make({}), UnknownRuleError);
    });

    it('validates against an injected rule registry', () => {
        const rules = new RuleRegistry().register('even', (value) => typeof value === 'number' && value % 2 === 0);

        class Counter extends PropertyContainer {
            protected override rules(): RuleSetDeclaration {
                return { count: ['required', 'even'] };
            }
        }

        assert.strictEqual(Counter.make({ count: 4 }, { rules }).get('count'), 4);
        expectViolation(() => Counter.make({ count: 3 }, { rules }), 'count', 'even');
        assert.throws(() => Counter.make({ count: 4 }), UnknownRuleError);
    });

    it('runs custom predicate rules', () => {
        class Invoice extends PropertyContainer {
            protected override rules(): RuleSetDeclaration {
                return { number: ['string', (value) => String(value).startsWith('INV-')] };
            }
        }

        assert.doesNotThrow(() => Invoice.make({ number: 'INV-001' }));
        expectViolation(() => Invoice.make({ number: 'X-001' }), 'number', 'custom rule');
        expectViolation(() => Invoice.make({ number: 1 }), 'number', 'string');
    });
});

// ===========================================================================
// Dates
// ===========================================================================

describe('Dates', () => {
    it('converts properties designated as dates', () => {
        const container = example({ test_date: '1970-01-01' });

        const value = container.get('test_date');

        assert.ok(value instanceof Date);
        assert.strictEqual(value.getTime(), 0);
        assert.strictEqual(container.raw('test_date'), '1970-01-01');
    });

    it('coerces on every read', () => {
        const container = example({ test_date: '2021-03-04' });

        const first = container.get('test_date');
        const second = container.get('test_date');

        assert.notStrictEqual(first, second);
        assert.deepStrictEqual(first, second);
    });

    it('returns null for an unset date field', () => {
        assert.strictEqual(example().get('test_date'), null);
    });

    it('throws when a date field holds something else', () => {
        const container = example().set('test_date', '2021-01-01T25:00');
        assert.throws(() => container.get('test_date'), { code: 'date_coercion', field: 'test_date' });
    });
});

// ===========================================================================
// Export and merge
// ===========================================================================

describe('Export and merge', () => {
    it('round-trips its data through toMap()', () => {
        const data = { some_property: 'some_value', count: 3, flag: false, nothing: null };
        assert.deepStrictEqual(PropertyContainer.make(data).toMap(), data);
    });

    it('converts itself to JSON', () => {
        const container = PropertyContainer.make({
            some_property: 'some_value',
            some_other_property: 'some_other_value',
        });

        assert.strictEqual(container.toJson(), '{"some_property":"some_value","some_other_property":"some_other_value"}');
    });

    it('exports raw values, not accessor results or dates', () => {
        const container = example({ test_date: '1970-01-01' });

        assert.deepStrictEqual(container.toMap(), {
            some_required_property: 'needed',
            test_date: '1970-01-01',
        });
    });

    it('merges with other containers, overwriting on conflict', () => {
        const a = PropertyContainer.make({ x: 1 });
        const b = PropertyContainer.make({ x: 2, y: 3 });

        const merged = a.merge(b);

        assert.strictEqual(merged, a);
        assert.strictEqual(a.get('x'), 2);
        assert.strictEqual(a.get('y'), 3);
    });

    it('re-validates on merge', () => {
        const a = example();
        const b = PropertyContainer.make({ some_required_property: 'other', some_integer_property: 1.5 });

        expectViolation(() => a.merge(b), 'some_integer_property', 'int');
        assert.strictEqual(a.get('some_required_property'), 'needed');
    });
});
