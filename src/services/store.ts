/**
 * Persistent Store
 *
 * Create/read/update/delete access to plans, users and linked accounts.
 * Constraint violations are reported as StoreError subclasses; nothing is
 * repaired or partially applied here. Cross-row rules (plan limits, a single
 * primary receiver) live in accountPolicy.ts.
 */

import { and, asc, count, eq, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../db/database.js';
import {
    plans,
    users,
    accounts,
    type Plan,
    type User,
    type Account,
} from '../db/schema.js';
import { NotFound, translateDatabaseError } from '../errors.js';
import { createComponentLogger } from '../logger.js';
import { createPlanSchema, planIdSchema, type CreatePlanInput } from '../validation/plans.js';
import {
    createUserSchema,
    telegramIdSchema,
    userProfileSchema,
    updateUserPlanSchema,
    type CreateUserInput,
    type UserProfileInput,
} from '../validation/users.js';
import {
    accountIdSchema,
    balanceSchema,
    createAccountSchema,
    phoneNumberSchema,
    type CreateAccountInput,
} from '../validation/accounts.js';

const log = createComponentLogger('store');

export type UserWithAccounts = User & { accounts: Account[] };

export interface AccountTokens {
    accessToken: string | null;
    refreshToken: string | null;
}

export class Store {
    constructor(private readonly db: Database) {}

    /**
     * Run `fn` against a store bound to a single transaction. Nested calls
     * open savepoints.
     */
    async transaction<T>(fn: (store: Store) => Promise<T>): Promise<T> {
        return this.run(() => this.db.transaction((tx) => fn(new Store(tx))));
    }

    private async run<T>(operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (err) {
            throw translateDatabaseError(err);
        }
    }

    private ownedBy(userId: number | undefined): SQL | undefined {
        return userId === undefined ? undefined : eq(accounts.userId, telegramIdSchema.parse(userId));
    }

    // =========================================================================
    // Plans
    // =========================================================================

    async createPlan(input: CreatePlanInput): Promise<Plan> {
        const values = createPlanSchema.parse(input);

        const [plan] = await this.run(() =>
            this.db.insert(plans).values({
                name: values.name,
                price: values.price,
                maxAccounts: values.maxAccounts,
                description: values.description ?? null,
                durationDays: values.durationDays,
            }).returning()
        );

        log.info({ planId: plan.id, name: plan.name }, 'Plan created');
        return plan;
    }

    async getPlan(planId: number): Promise<Plan | null> {
        const plan = await this.db.query.plans.findFirst({
            where: eq(plans.id, planIdSchema.parse(planId)),
        });
        return plan ?? null;
    }

    async listPlans(): Promise<Plan[]> {
        return this.db.select().from(plans).orderBy(asc(plans.id));
    }

    /**
     * Fails with ForeignKeyViolation while any user still references the plan.
     */
    async deletePlan(planId: number): Promise<boolean> {
        const deleted = await this.run(() =>
            this.db.delete(plans)
                .where(eq(plans.id, planIdSchema.parse(planId)))
                .returning({ id: plans.id })
        );
        return deleted.length > 0;
    }

    // =========================================================================
    // Users
    // =========================================================================

    /**
     * Insert a new user. A taken telegram id raises UniqueConstraintViolation
     * and leaves the existing row untouched.
     */
    async createUser(input: CreateUserInput): Promise<User> {
        const values = createUserSchema.parse(input);

        const [user] = await this.run(() =>
            this.db.insert(users).values(values).returning()
        );

        log.info({ telegramId: user.telegramId }, 'User created');
        return user;
    }

    /**
     * First-contact registration: returns the existing row when present.
     */
    async ensureUser(telegramId: number): Promise<User> {
        const id = telegramIdSchema.parse(telegramId);

        const [created] = await this.run(() =>
            this.db.insert(users)
                .values({ telegramId: id })
                .onConflictDoNothing({ target: users.telegramId })
                .returning()
        );
        if (created) {
            log.info({ telegramId: id }, 'User registered on first contact');
            return created;
        }

        const existing = await this.getUser(id);
        if (!existing) {
            throw new NotFound('user', id);
        }
        return existing;
    }

    async getUser(telegramId: number): Promise<User | null> {
        const user = await this.db.query.users.findFirst({
            where: eq(users.telegramId, telegramIdSchema.parse(telegramId)),
        });
        return user ?? null;
    }

    /**
     * Read the user row with a row lock held until the surrounding
     * transaction ends.
     */
    async getUserForUpdate(telegramId: number): Promise<User | null> {
        const [user] = await this.db
            .select()
            .from(users)
            .where(eq(users.telegramId, telegramIdSchema.parse(telegramId)))
            .for('update');
        return user ?? null;
    }

    async updateUserProfile(telegramId: number, profile: UserProfileInput): Promise<User> {
        const values = userProfileSchema.parse(profile);

        const [user] = await this.run(() =>
            this.db.update(users)
                .set({ username: values.username ?? null, firstName: values.firstName ?? null })
                .where(eq(users.telegramId, telegramIdSchema.parse(telegramId)))
                .returning()
        );
        if (!user) {
            throw new NotFound('user', telegramId);
        }
        return user;
    }

    async setUserAdmin(telegramId: number, isAdmin: boolean): Promise<User> {
        const [user] = await this.run(() =>
            this.db.update(users)
                .set({ isAdmin })
                .where(eq(users.telegramId, telegramIdSchema.parse(telegramId)))
                .returning()
        );
        if (!user) {
            throw new NotFound('user', telegramId);
        }

        log.info({ telegramId, isAdmin }, 'User admin flag changed');
        return user;
    }

    /**
     * Assign (or with `planId = null`, clear) the user's plan and expiry.
     */
    async updateUserPlan(telegramId: number, planId: number | null, expiry: Date | null): Promise<User> {
        const values = updateUserPlanSchema.parse({ telegramId, planId, expiry });

        return this.transaction(async (store) => {
            if (values.planId !== null && !(await store.getPlan(values.planId))) {
                throw new NotFound('plan', values.planId);
            }

            const [user] = await store.db.update(users)
                .set({ planId: values.planId, planExpiry: values.expiry })
                .where(eq(users.telegramId, values.telegramId))
                .returning();
            if (!user) {
                throw new NotFound('user', values.telegramId);
            }

            log.info({ telegramId: values.telegramId, planId: values.planId, expiry: values.expiry }, 'User plan updated');
            return user;
        });
    }

    /**
     * Delete a user; every owned account goes with it in the same statement
     * (ON DELETE CASCADE).
     */
    async deleteUser(telegramId: number): Promise<boolean> {
        const deleted = await this.run(() =>
            this.db.delete(users)
                .where(eq(users.telegramId, telegramIdSchema.parse(telegramId)))
                .returning({ telegramId: users.telegramId })
        );

        if (deleted.length > 0) {
            log.info({ telegramId }, 'User deleted with linked accounts');
        }
        return deleted.length > 0;
    }

    async listUsersWithAccounts(): Promise<UserWithAccounts[]> {
        return this.db.query.users.findMany({
            orderBy: asc(users.telegramId),
            with: {
                accounts: {
                    orderBy: asc(accounts.id),
                },
            },
        });
    }

    // =========================================================================
    // Accounts
    // =========================================================================

    /**
     * Link an account. A phone number already present anywhere raises
     * UniqueConstraintViolation; an unknown user raises ForeignKeyViolation.
     */
    async createAccount(input: CreateAccountInput): Promise<Account> {
        const values = createAccountSchema.parse(input);

        const [account] = await this.run(() =>
            this.db.insert(accounts).values(values).returning()
        );

        log.info({ accountId: account.id, userId: account.userId, phoneNumber: account.phoneNumber }, 'Account linked');
        return account;
    }

    async getAccount(accountId: number): Promise<Account | null> {
        const account = await this.db.query.accounts.findFirst({
            where: eq(accounts.id, accountIdSchema.parse(accountId)),
        });
        return account ?? null;
    }

    /**
     * With `userId`, an account linked by someone else reads as missing.
     */
    async getAccountByPhone(phoneNumber: string, userId?: number): Promise<Account | null> {
        const account = await this.db.query.accounts.findFirst({
            where: and(
                eq(accounts.phoneNumber, phoneNumberSchema.parse(phoneNumber)),
                this.ownedBy(userId)
            ),
        });
        return account ?? null;
    }

    async listUserAccounts(userId: number): Promise<Account[]> {
        return this.db
            .select()
            .from(accounts)
            .where(eq(accounts.userId, telegramIdSchema.parse(userId)))
            .orderBy(asc(accounts.id));
    }

    async listAllAccounts(): Promise<Account[]> {
        return this.db.select().from(accounts).orderBy(asc(accounts.id));
    }

    async countUserAccounts(userId: number): Promise<number> {
        const [row] = await this.db
            .select({ value: count() })
            .from(accounts)
            .where(eq(accounts.userId, telegramIdSchema.parse(userId)));
        return row?.value ?? 0;
    }

    /**
     * With `userId`, only an account that user owns is removed.
     */
    async deleteAccount(accountId: number, userId?: number): Promise<boolean> {
        const deleted = await this.run(() =>
            this.db.delete(accounts)
                .where(and(eq(accounts.id, accountIdSchema.parse(accountId)), this.ownedBy(userId)))
                .returning({ id: accounts.id })
        );

        if (deleted.length > 0) {
            log.info({ accountId, userId }, 'Account unlinked');
        }
        return deleted.length > 0;
    }

    /**
     * Replace the account's tokens. `tokenUpdatedAt` defaults to the
     * database clock.
     */
    async updateAccountTokens(accountId: number, tokens: AccountTokens, tokenUpdatedAt?: Date): Promise<Account> {
        const [account] = await this.run(() =>
            this.db.update(accounts)
                .set({
                    accessToken: tokens.accessToken,
                    refreshToken: tokens.refreshToken,
                    tokenUpdatedAt: tokenUpdatedAt ?? sql`now()`,
                })
                .where(eq(accounts.id, accountIdSchema.parse(accountId)))
                .returning()
        );
        if (!account) {
            throw new NotFound('account', accountId);
        }

        log.debug({ accountId }, 'Account tokens updated');
        return account;
    }

    /**
     * Cache a freshly polled balance. `lastBalanceUpdate` defaults to the
     * database clock.
     */
    async updateAccountBalance(accountId: number, balance: number, lastBalanceUpdate?: Date): Promise<Account> {
        const [account] = await this.run(() =>
            this.db.update(accounts)
                .set({
                    currentBalance: balanceSchema.parse(balance),
                    lastBalanceUpdate: lastBalanceUpdate ?? sql`now()`,
                })
                .where(eq(accounts.id, accountIdSchema.parse(accountId)))
                .returning()
        );
        if (!account) {
            throw new NotFound('account', accountId);
        }

        log.debug({ accountId, balance }, 'Account balance updated');
        return account;
    }

    /**
     * Flag one of the user's accounts as primary receiver. Other accounts of
     * the user keep their flag; see designatePrimaryReceiver for the
     * exclusive version.
     */
    async setPrimaryReceiver(userId: number, accountId: number): Promise<Account> {
        const [account] = await this.run(() =>
            this.db.update(accounts)
                .set({ isPrimaryReceiver: true })
                .where(and(
                    eq(accounts.id, accountIdSchema.parse(accountId)),
                    eq(accounts.userId, telegramIdSchema.parse(userId))
                ))
                .returning()
        );
        if (!account) {
            throw new NotFound('account', accountId);
        }
        return account;
    }

    /**
     * Returns the number of accounts that lost the flag.
     */
    async clearPrimaryReceivers(userId: number): Promise<number> {
        const cleared = await this.run(() =>
            this.db.update(accounts)
                .set({ isPrimaryReceiver: false })
                .where(and(
                    eq(accounts.userId, telegramIdSchema.parse(userId)),
                    eq(accounts.isPrimaryReceiver, true)
                ))
                .returning({ id: accounts.id })
        );
        return cleared.length;
    }

    async getPrimaryReceiver(userId: number): Promise<Account | null> {
        const account = await this.db.query.accounts.findFirst({
            where: and(
                eq(accounts.userId, telegramIdSchema.parse(userId)),
                eq(accounts.isPrimaryReceiver, true)
            ),
            orderBy: asc(accounts.id),
        });
        return account ?? null;
    }
}
