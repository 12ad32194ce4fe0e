/**
 * Macros: callables registered at runtime and invocable as methods on any container.
 */

import type { PropertyContainer } from '../container.js';
import type { MacroFn } from './types.js';
import { UnknownMethodError } from './errors.js';

/**
 * Name to macro table shared by every container that uses it, whatever its type.
 * Registering a name again replaces the previous macro. Entries are never removed,
 * and registration does no locking.
 */
export class MacroRegistry {
    private readonly macros = new Map<string, MacroFn>();

    register(name: string, macro: MacroFn): this {
        this.macros.set(name, macro);
        return this;
    }

    has(name: string): boolean {
        return this.macros.has(name);
    }

    /**
     * Call a macro with the container prepended to its arguments.
     * @throws UnknownMethodError if no macro is registered under the name
     */
    invoke(container: PropertyContainer, name: string, args: readonly unknown[] = []): unknown {
        const macro = this.macros.get(name);
        if (!macro) {
            throw new UnknownMethodError(name, container.constructor.name);
        }
        return macro(container, ...args);
    }
}

/**
 * Process-wide macro table behind PropertyContainer.macro().
 * Lives until process exit.
 */
export const globalMacros = new MacroRegistry();
