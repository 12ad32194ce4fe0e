/**
 * PropertyContainer - a property bag with declared validation rules.
 *
 * Subclasses declare their contract through three hooks:
 *
 *     class Invoice extends PropertyContainer {
 *         protected override rules() {
 *             return { number: ['required', 'string'], total: ['numeric', 'greaterThanEqual:0'] };
 *         }
 *         protected override dates() {
 *             return ['issued_at'];
 *         }
 *         protected override accessors() {
 *             return { label: () => `#${this.get('number')}` };
 *         }
 *     }
 *
 * The hooks run while the base constructor fills the container, before any
 * subclass field initializers, so they must not read subclass fields.
 */

import type {
    PropertyMap,
    RuleSetDeclaration,
    CompiledRuleSet,
    AccessorMap,
    MacroFn,
    ContainerOptions,
    ValidationResult,
} from './core/types.js';
import { PropertyStore } from './core/store.js';
import { defaultRules } from './core/rules.js';
import type { RuleRegistry } from './core/rules.js';
import { globalMacros } from './core/macros.js';
import type { MacroRegistry } from './core/macros.js';
import { compileRuleSet } from './core/parser.js';
import { validateData, collectViolations } from './core/validate.js';
import { resolveProperty, indexAccessors } from './core/resolver.js';
import type { AccessorIndex } from './core/resolver.js';
import { PropertyValidationError, UnknownMethodError } from './core/errors.js';

/** Compiled rule sets, one per container type */
const compiledRuleSets = new WeakMap<object, CompiledRuleSet>();

type ContainerType<T extends PropertyContainer> = new (data?: PropertyMap, options?: ContainerOptions) => T;

export class PropertyContainer {
    private readonly store = new PropertyStore();
    private readonly ruleRegistry: RuleRegistry;
    private readonly macroRegistry: MacroRegistry;
    private accessorIndex?: AccessorIndex;
    private dateFields?: ReadonlySet<string>;

    /**
     * Validate and store `data`.
     * @throws PropertyValidationError on the first field that fails
     */
    constructor(data: PropertyMap = {}, options: ContainerOptions = {}) {
        this.ruleRegistry = options.rules ?? defaultRules;
        this.macroRegistry = options.macros ?? globalMacros;
        this.fill(data);
    }

    /**
     * Same as `new`, callable on any subclass.
     */
    static make<T extends PropertyContainer>(this: ContainerType<T>, data: PropertyMap = {}, options?: ContainerOptions): T {
        return new this(data, options);
    }

    /**
     * Register a macro on the process-wide registry, making it callable on every
     * container built without a registry of its own.
     */
    static macro(name: string, macro: MacroFn): void {
        globalMacros.register(name, macro);
    }

    // ============================================================
    // Declaration hooks
    // ============================================================

    /**
     * Validation rules by field name. Fields are only validated when present
     * in the data, unless marked `required`.
     */
    protected rules(): RuleSetDeclaration {
        return {};
    }

    /**
     * Fields read back as Date objects.
     */
    protected dates(): readonly string[] {
        return [];
    }

    /**
     * Computed accessors by field name. An accessor answers reads of its field
     * ahead of macros and stored values.
     */
    protected accessors(): AccessorMap {
        return {};
    }

    // ============================================================
    // Writing
    // ============================================================

    /**
     * Validate `data` against the declared rules, then store every entry.
     * Undeclared fields are stored without validation. Nothing is stored
     * if validation fails.
     */
    fill(data: PropertyMap): this {
        const result = validateData(this.compiledRules(), data, this.ruleRegistry);
        if (!result.valid) {
            throw new PropertyValidationError(result.violations[0]);
        }

        for (const [name, value] of Object.entries(data)) {
            this.store.set(name, value);
        }
        return this;
    }

    /**
     * Fill with another container's stored values. Existing fields are overwritten.
     */
    merge(other: PropertyContainer): this {
        return this.fill(other.toMap());
    }

    /**
     * Store a value without validation.
     */
    set(name: string, value: unknown): this {
        this.store.set(name, value);
        return this;
    }

    forget(name: string): this {
        this.store.forget(name);
        return this;
    }

    // ============================================================
    // Reading
    // ============================================================

    /**
     * Read a property through its accessor, a macro, or storage.
     * Declared date fields come back as Date objects.
     */
    get(name: string): unknown {
        this.accessorIndex ??= indexAccessors(this.accessors());
        this.dateFields ??= new Set(this.dates());

        return resolveProperty({
            container: this,
            store: this.store,
            accessors: this.accessorIndex,
            dateFields: this.dateFields,
            macros: this.macroRegistry,
        }, name);
    }

    /**
     * Stored value with no accessor or date coercion applied.
     */
    raw(name: string): unknown {
        return this.store.read(name) ?? null;
    }

    /**
     * Whether the property is stored with a non-null value.
     */
    has(name: string): boolean {
        return this.store.has(name);
    }

    doesNotHave(name: string): boolean {
        return !this.has(name);
    }

    hasMacro(name: string): boolean {
        return this.macroRegistry.has(name);
    }

    /**
     * Check data against the declared rules without storing it.
     * Unlike fill(), every failing field is reported.
     */
    check(data: PropertyMap): ValidationResult {
        const violations = collectViolations(this.compiledRules(), data, this.ruleRegistry);
        return { valid: violations.length === 0, violations };
    }

    // ============================================================
    // Dispatch
    // ============================================================

    /**
     * Call a method by name: a computed accessor (`getSomeField`), a method of
     * the container, or a macro, in that order.
     * @throws UnknownMethodError if none of them exists
     */
    call(method: string, ...args: unknown[]): unknown {
        this.accessorIndex ??= indexAccessors(this.accessors());

        const accessor = this.accessorIndex.get(method);
        if (accessor) {
            return accessor();
        }

        const member = this.declaredMethod(method);
        if (member) {
            return Reflect.apply(member, this, args);
        }

        if (this.macroRegistry.has(method)) {
            return this.macroRegistry.invoke(this, method, args);
        }

        throw new UnknownMethodError(method, this.constructor.name);
    }

    /**
     * Property-style view: reading `view.name` calls get(), assigning calls set(),
     * `delete` calls forget().
     */
    fields(): Record<string, unknown> {
        return new Proxy<Record<string, unknown>>({}, {
            get: (_target, prop) => (typeof prop === 'string' ? this.get(prop) : undefined),
            set: (_target, prop, value) => {
                if (typeof prop !== 'string') {
                    return false;
                }
                this.set(prop, value);
                return true;
            },
            has: (_target, prop) => typeof prop === 'string' && this.has(prop),
            deleteProperty: (_target, prop) => {
                if (typeof prop === 'string') {
                    this.forget(prop);
                }
                return true;
            },
        });
    }

    // ============================================================
    // Export
    // ============================================================

    /**
     * Stored values as a plain object. Accessors and date coercion are not applied.
     */
    toMap(): PropertyMap {
        return this.store.toMap();
    }

    toJson(): string {
        return JSON.stringify(this.toMap());
    }

    // ============================================================
    // Internals
    // ============================================================

    private compiledRules(): CompiledRuleSet {
        let compiled = compiledRuleSets.get(this.constructor);
        if (!compiled) {
            compiled = compileRuleSet(this.rules());
            compiledRuleSets.set(this.constructor, compiled);
        }
        return compiled;
    }

    private declaredMethod(name: string): Function | undefined {
        if (name === 'constructor' || name in Object.prototype) {
            return undefined;
        }
        const member: unknown = Reflect.get(this, name);
        return typeof member === 'function' ? member : undefined;
    }
}
