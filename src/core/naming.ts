/**
 * Name normalization shared by rule lookup and accessor resolution.
 */

/**
 * Convert a dash, underscore or camel cased name to PascalCase.
 * `date_format`, `date-format`, `dateFormat` and `DateFormat` all give `DateFormat`.
 */
export function toPascal(name: string): string {
    return name
        .split(/[-_\s]+/)
        .filter(part => part !== '')
        .map(part => part.charAt(0).toUpperCase() + part.slice(1))
        .join('');
}

/**
 * Name of the computed accessor that shadows a field: `some_field` → `getSomeField`.
 */
export function accessorName(field: string): string {
    return 'get' + toPascal(field);
}
