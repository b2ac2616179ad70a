/**
 * Regular word-form generation. Irregular forms come from explicit
 * `{...}` lists in the dictionaries and never pass through here.
 */

export function makePlural(noun: string): string {
    if (noun.endsWith('Y')) return noun.slice(0, -1) + 'IES';
    if (noun.endsWith('S')) return noun + 'ES';
    return noun + 'S';
}

/** Third person, past and progressive forms of a regular verb */
export function makeVerbForms(root: string): string[] {
    if (root.endsWith('E')) {
        return [root + 'S', root + 'D', root.slice(0, -1) + 'ING'];
    }
    return [root + 'S', root + 'ED', root + 'ING'];
}
