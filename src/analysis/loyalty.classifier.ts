import type { Contact, LoyaltyDistribution, LoyaltyTier } from '../types';
import { LOYALTY_THRESHOLDS, LOYALTY_TIERS } from '../utils/constants';

// ============================================================================
// LOYALTY TIERS
// ============================================================================

/**
 * Maps a contact's distinct session count onto a tier. Lower bounds are
 * inclusive, so 5 sessions is `regular` and 10 is `frequent`.
 */
export function assignLoyaltyTier(sessionCount: number): LoyaltyTier {
    for (const { tier, minSessions } of LOYALTY_THRESHOLDS) {
        if (sessionCount >= minSessions) return tier;
    }
    return 'single';
}

function emptyTierRecord(): Record<LoyaltyTier, number> {
    return { single: 0, occasional: 0, regular: 0, frequent: 0 };
}

/**
 * Counts contacts per tier; shares are 0 when there are no contacts
 */
export function computeLoyaltyDistribution(contacts: readonly Contact[]): LoyaltyDistribution {
    const counts = emptyTierRecord();
    for (const contact of contacts) {
        counts[contact.tier] += 1;
    }

    const shares = emptyTierRecord();
    if (contacts.length > 0) {
        for (const tier of LOYALTY_TIERS) {
            shares[tier] = counts[tier] / contacts.length;
        }
    }

    return { contacts: contacts.length, counts, shares };
}
