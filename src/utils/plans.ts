/**
 * Plan Constants and Pure Functions
 *
 * This module provides:
 * - The free tier every user falls back to
 * - Subscription expiry calculations
 * - Linked-account capacity calculations
 */

import type { Plan, User } from '../db/schema.js';

// =============================================================================
// Types
// =============================================================================

export interface EffectivePlan {
    planId: number | null;
    name: string;
    maxAccounts: number;
    expiry: Date | null;
    isFreeTier: boolean;
}

export interface AccountCapacity {
    used: number;
    limit: number;
    remaining: number;
    allowed: boolean;
}

// =============================================================================
// Free Tier
// =============================================================================

/**
 * Seeded into an empty catalog and applied to users without an active plan.
 */
export const FREE_PLAN = {
    name: 'Free',
    maxAccounts: 1,
    description: 'Free plan',
    durationDays: 30,
} as const;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// =============================================================================
// Subscription Functions
// =============================================================================

export function computeExpiry(from: Date, durationDays: number): Date {
    return new Date(from.getTime() + durationDays * MS_PER_DAY);
}

/**
 * Active strictly before the expiry instant. A plan without an expiry was
 * never granted a term, so it counts as lapsed.
 */
export function isSubscriptionActive(expiry: Date | null, now: Date): boolean {
    return expiry !== null && expiry.getTime() > now.getTime();
}

/**
 * Pick the plan that governs a user right now: the assigned plan while its
 * subscription is active, the free tier otherwise.
 */
export function resolveEffectivePlan(
    user: Pick<User, 'planId' | 'planExpiry'>,
    plan: Pick<Plan, 'id' | 'name' | 'maxAccounts'> | null,
    now: Date,
    freeMaxAccounts: number = FREE_PLAN.maxAccounts
): EffectivePlan {
    if (user.planId !== null && plan !== null && plan.id === user.planId && isSubscriptionActive(user.planExpiry, now)) {
        return {
            planId: plan.id,
            name: plan.name,
            maxAccounts: plan.maxAccounts,
            expiry: user.planExpiry,
            isFreeTier: false,
        };
    }

    return {
        planId: null,
        name: FREE_PLAN.name,
        maxAccounts: freeMaxAccounts,
        expiry: null,
        isFreeTier: true,
    };
}

// =============================================================================
// Capacity Functions
// =============================================================================

export function calculateAccountCapacity(used: number, limit: number): AccountCapacity {
    const remaining = Math.max(0, limit - used);
    return {
        used,
        limit,
        remaining,
        allowed: used < limit,
    };
}
