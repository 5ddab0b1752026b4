/**
 * Account Policy Service
 *
 * Cross-row rules the schema cannot express, checked inside the same
 * transaction as the write they guard:
 * - a user holds at most `max_accounts` linked accounts for their plan
 * - at most one account per user is the primary receiver
 *
 * The owning user row is locked first so concurrent writes for the same user
 * serialize; writes for different users do not block each other.
 */

import type { Account } from '../db/schema.js';
import { NotFound, PlanLimitExceeded } from '../errors.js';
import { createComponentLogger } from '../logger.js';
import { calculateAccountCapacity, type AccountCapacity } from '../utils/plans.js';
import type { AccountSessionInput } from '../validation/accounts.js';
import type { Store } from './store.js';
import { getEffectiveSubscription } from './subscriptions.js';

const log = createComponentLogger('account-policy');

export interface AccountCapacityCheck extends AccountCapacity {
    planName: string;
}

export async function checkAccountCapacity(
    store: Store,
    userId: number,
    now: Date = new Date()
): Promise<AccountCapacityCheck> {
    const subscription = await getEffectiveSubscription(store, userId, now);
    const used = await store.countUserAccounts(userId);

    return {
        ...calculateAccountCapacity(used, subscription.maxAccounts),
        planName: subscription.name,
    };
}

/**
 * Link a new account for the user, registering the user on first contact.
 * Fails with PlanLimitExceeded once the plan's account limit is reached.
 */
export async function linkAccount(
    store: Store,
    userId: number,
    phoneNumber: string,
    session: AccountSessionInput = {},
    now: Date = new Date()
): Promise<Account> {
    return store.transaction(async (tx) => {
        await tx.ensureUser(userId);
        await tx.getUserForUpdate(userId);

        const capacity = await checkAccountCapacity(tx, userId, now);
        if (!capacity.allowed) {
            log.warn({ userId, phoneNumber, limit: capacity.limit, planName: capacity.planName }, 'Account limit reached');
            throw new PlanLimitExceeded(userId, capacity.limit, capacity.planName);
        }

        return tx.createAccount({ ...session, userId, phoneNumber });
    });
}

/**
 * Make `accountId` the user's only primary receiver.
 */
export async function designatePrimaryReceiver(
    store: Store,
    userId: number,
    accountId: number
): Promise<Account> {
    return store.transaction(async (tx) => {
        const user = await tx.getUserForUpdate(userId);
        if (!user) {
            throw new NotFound('user', userId);
        }

        const account = await tx.getAccount(accountId);
        if (!account || account.userId !== userId) {
            throw new NotFound('account', accountId);
        }

        await tx.clearPrimaryReceivers(userId);
        const primary = await tx.setPrimaryReceiver(userId, accountId);

        log.info({ userId, accountId, phoneNumber: primary.phoneNumber }, 'Primary receiver designated');
        return primary;
    });
}
