/**
 * Property read resolution.
 * A read is answered by the first of: computed accessor, macro, stored value.
 */

import type { PropertyContainer } from '../container.js';
import type { AccessorMap } from './types.js';
import type { PropertyStore } from './store.js';
import type { MacroRegistry } from './macros.js';
import { accessorName } from './naming.js';
import { parseDate } from './temporal.js';
import { DateCoercionError } from './errors.js';

export type AccessorIndex = ReadonlyMap<string, () => unknown>;

/**
 * Everything a read can be answered from.
 */
export interface ResolutionContext {
    container: PropertyContainer;
    store: PropertyStore;
    accessors: AccessorIndex;
    dateFields: ReadonlySet<string>;
    macros: MacroRegistry;
}

/**
 * Key declared accessors by accessor name, so `some_field` and `someField`
 * both land on `getSomeField`.
 */
export function indexAccessors(accessors: AccessorMap): AccessorIndex {
    const index = new Map<string, () => unknown>();
    for (const [field, accessor] of Object.entries(accessors)) {
        index.set(accessorName(field), accessor);
    }
    return index;
}

/**
 * Coerce a stored date field value. A new Date is returned on every read.
 */
function coerceDate(field: string, raw: unknown): Date {
    const [date, ok] = parseDate(raw);
    if (!ok) {
        throw new DateCoercionError(field, raw);
    }
    return new Date(date.getTime());
}

/**
 * Resolve a property read. Never writes to the store.
 *
 * Accessors win over macros and stored values, so a derived property
 * cannot be bypassed by storing a field of the same name.
 */
export function resolveProperty(ctx: ResolutionContext, field: string): unknown {
    const name = accessorName(field);

    const accessor = ctx.accessors.get(name);
    if (accessor) {
        return accessor();
    }

    if (ctx.macros.has(name)) {
        return ctx.macros.invoke(ctx.container, name);
    }

    if (!ctx.store.has(field)) {
        return null;
    }

    const raw = ctx.store.read(field);
    if (ctx.dateFields.has(field)) {
        return coerceDate(field, raw);
    }
    return raw;
}
