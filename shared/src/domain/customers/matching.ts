/**
 * Customer Identity Matching
 *
 * Every comparison of customer names or shops across orders and registries
 * goes through a CustomerMatchPolicy. Extraction and conversion detection
 * never compare raw strings themselves.
 *
 * exact      - verbatim strings (default; homonyms and stray whitespace
 *              produce false matches and misses respectively)
 * normalized - NFKC, trimmed, lower-cased
 */

export type CustomerMatchPolicyName = 'exact' | 'normalized';

export interface CustomerMatchPolicy {
    readonly name: CustomerMatchPolicyName;
    /** Key two customer names must share to be the same customer */
    nameKey(customerName: string): string;
    /** Key two shops must share; null means "no shop recorded" */
    shopKey(shop: string | null): string | null;
}

export const exactMatchPolicy: CustomerMatchPolicy = {
    name: 'exact',
    nameKey: (customerName) => customerName,
    shopKey: (shop) => shop,
};

function normalizeKey(value: string): string {
    return value.normalize('NFKC').trim().toLowerCase();
}

export const normalizedMatchPolicy: CustomerMatchPolicy = {
    name: 'normalized',
    nameKey: normalizeKey,
    shopKey: (shop) => {
        if (shop === null) return null;
        const key = normalizeKey(shop);
        return key.length > 0 ? key : null;
    },
};

const POLICIES: Record<CustomerMatchPolicyName, CustomerMatchPolicy> = {
    exact: exactMatchPolicy,
    normalized: normalizedMatchPolicy,
};

export function getMatchPolicy(name: CustomerMatchPolicyName): CustomerMatchPolicy {
    return POLICIES[name];
}
