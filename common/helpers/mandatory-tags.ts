import { CommonTags } from '../types';

/**
 * Flatten the mandatory tag set into a plain mapping, dropping unset optional keys.
 */
export function toTagMap(tags: CommonTags): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(tags)) {
        if (typeof value === 'string' && value.length > 0) {
            result[key] = value;
        }
    }
    return result;
}

/**
 * Merge the mandatory tags over additional tags. Mandatory keys always win.
 */
export function mergeTags(
    mandatory: CommonTags,
    ...additional: (Record<string, string> | undefined)[]
): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const tags of additional) {
        Object.assign(merged, tags ?? {});
    }
    return { ...merged, ...toTagMap(mandatory) };
}
