/**
 * Subscription Service
 *
 * Grants plans to users and resolves the plan currently in force.
 */

import { config } from '../config.js';
import { NotFound } from '../errors.js';
import { createComponentLogger } from '../logger.js';
import type { User } from '../db/schema.js';
import { computeExpiry, resolveEffectivePlan, type EffectivePlan } from '../utils/plans.js';
import type { Store } from './store.js';

const log = createComponentLogger('subscriptions');

/**
 * Assign a plan for `durationDays` (the plan's own duration by default),
 * starting at `now`.
 */
export async function grantSubscription(
    store: Store,
    userId: number,
    planId: number,
    durationDays?: number,
    now: Date = new Date()
): Promise<User> {
    return store.transaction(async (tx) => {
        const plan = await tx.getPlan(planId);
        if (!plan) {
            throw new NotFound('plan', planId);
        }

        const expiry = computeExpiry(now, durationDays ?? plan.durationDays);
        const user = await tx.updateUserPlan(userId, plan.id, expiry);

        log.info({ userId, planId: plan.id, planName: plan.name, expiry }, 'Subscription granted');
        return user;
    });
}

export async function revokeSubscription(store: Store, userId: number): Promise<User> {
    const user = await store.updateUserPlan(userId, null, null);
    log.info({ userId }, 'Subscription revoked');
    return user;
}

/**
 * The plan governing the user at `now`; the free tier when no plan is
 * assigned, it has no expiry, or it has expired.
 */
export async function getEffectiveSubscription(
    store: Store,
    userId: number,
    now: Date = new Date()
): Promise<EffectivePlan> {
    const user = await store.getUser(userId);
    if (!user) {
        throw new NotFound('user', userId);
    }

    const plan = user.planId !== null ? await store.getPlan(user.planId) : null;
    return resolveEffectivePlan(user, plan, now, config.FREE_PLAN_MAX_ACCOUNTS);
}
