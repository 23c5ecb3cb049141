/**
 * Turn customer:update flags into a profile patch. Validation is left to the
 * service, so unknown --clear names surface as validation errors there.
 */

export interface ProfileFlags {
    name?: string;
    shop?: string;
    handler?: string;
    region?: string;
    notes?: string;
    wechat?: string;
    /** Comma-separated; an empty list removes every tag */
    tags?: string;
    /** Comma-separated field names to set to null */
    clear?: string;
}

function splitList(value: string): string[] {
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '');
}

export function buildProfilePatch(flags: ProfileFlags): Record<string, unknown> {
    const patch: Record<string, unknown> = {};

    if (flags.name !== undefined) patch.customerName = flags.name;
    if (flags.shop !== undefined) patch.shop = flags.shop;
    if (flags.handler !== undefined) patch.handler = flags.handler;
    if (flags.region !== undefined) patch.region = flags.region;
    if (flags.notes !== undefined) patch.notes = flags.notes;
    if (flags.wechat !== undefined) patch.wechat = flags.wechat;
    if (flags.tags !== undefined) patch.tags = splitList(flags.tags);

    for (const key of splitList(flags.clear ?? '')) {
        patch[key] = null;
    }
    return patch;
}
