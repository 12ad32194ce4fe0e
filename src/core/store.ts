/**
 * Per-container property storage. No validation happens here.
 */

import type { PropertyMap } from './types.js';
import { isNil } from './operators.js';

export class PropertyStore {
    private readonly entries = new Map<string, unknown>();

    /**
     * Create or overwrite an entry.
     */
    set(name: string, value: unknown): void {
        this.entries.set(name, value);
    }

    /**
     * Whether an entry exists with a non-null value.
     */
    has(name: string): boolean {
        return !isNil(this.entries.get(name));
    }

    /**
     * Stored value, or undefined when there is no entry.
     */
    read(name: string): unknown {
        return this.entries.get(name);
    }

    forget(name: string): void {
        this.entries.delete(name);
    }

    /**
     * Shallow copy of all entries as a plain object.
     */
    toMap(): PropertyMap {
        return Object.fromEntries(this.entries);
    }
}
