/**
 * Persistent Store Tests
 *
 * Runs against an in-process Postgres so unique, foreign-key and cascade
 * behaviour comes from the real constraints.
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { ZodError } from 'zod';
import { Store } from '../services/store.js';
import {
    ForeignKeyViolation,
    NotFound,
    UniqueConstraintViolation,
} from '../errors.js';
import { createTestDatabase, resetTestDatabase, type TestDatabase } from './helpers/testDb.js';

let testDb: TestDatabase;
let store: Store;

beforeAll(async () => {
    testDb = await createTestDatabase();
    store = new Store(testDb.db);
});

beforeEach(async () => {
    await resetTestDatabase(testDb.db);
});

afterAll(async () => {
    await testDb.client.close();
});

describe('Store', () => {
    describe('plans', () => {
        it('should apply column defaults for omitted fields', async () => {
            const plan = await store.createPlan({ name: 'Basic' });

            expect(plan).toEqual({
                id: 2,
                name: 'Basic',
                price: 0,
                maxAccounts: 1,
                description: null,
                durationDays: 30,
            });
        });

        it('should allow two plans with the same name', async () => {
            const first = await store.createPlan({ name: 'Pro', price: 5, maxAccounts: 3 });
            const second = await store.createPlan({ name: 'Pro', price: 9, maxAccounts: 5 });

            expect(second.id).toBe(first.id + 1);
            const names = (await store.listPlans()).map((plan) => plan.name);
            expect(names).toEqual(['Free', 'Pro', 'Pro']);
        });

        it('should return null for an unknown plan', async () => {
            expect(await store.getPlan(99)).toBeNull();
        });

        it('should refuse to delete a plan that a user references', async () => {
            const plan = await store.createPlan({ name: 'Pro', maxAccounts: 3 });
            await store.createUser({ telegramId: 42, planId: plan.id });

            await expect(store.deletePlan(plan.id)).rejects.toBeInstanceOf(ForeignKeyViolation);
            expect(await store.getPlan(plan.id)).not.toBeNull();
        });

        it('should store any value the columns can hold', async () => {
            const plan = await store.createPlan({ name: 'x'.repeat(101), price: -1, maxAccounts: 0 });

            expect(plan).toMatchObject({ name: 'x'.repeat(101), price: -1, maxAccounts: 0 });
            expect(await store.getPlan(plan.id)).toEqual(plan);
        });

        it('should delete an unused plan and report missing ones', async () => {
            const plan = await store.createPlan({ name: 'Trial' });

            expect(await store.deletePlan(plan.id)).toBe(true);
            expect(await store.deletePlan(plan.id)).toBe(false);
        });
    });

    describe('users', () => {
        it('should create a user with defaults', async () => {
            const user = await store.createUser({ telegramId: 1001 });

            expect(user.telegramId).toBe(1001);
            expect(user.isAdmin).toBe(false);
            expect(user.createdAt).toBeInstanceOf(Date);
            expect(user.username).toBeNull();
            expect(user.firstName).toBeNull();
            expect(user.planId).toBeNull();
            expect(user.planExpiry).toBeNull();
        });

        it('should store telegram ids beyond 32 bits', async () => {
            const user = await store.createUser({ telegramId: 6_123_456_789 });

            expect((await store.getUser(user.telegramId))?.telegramId).toBe(6_123_456_789);
        });

        it('should reject a duplicate telegram id and keep the original row', async () => {
            await store.createUser({ telegramId: 42, username: 'alice' });

            await expect(store.createUser({ telegramId: 42, username: 'mallory' }))
                .rejects.toBeInstanceOf(UniqueConstraintViolation);
            expect((await store.getUser(42))?.username).toBe('alice');
        });

        it('should reject a user referencing a missing plan', async () => {
            await expect(store.createUser({ telegramId: 42, planId: 99 }))
                .rejects.toBeInstanceOf(ForeignKeyViolation);
            expect(await store.getUser(42)).toBeNull();
        });

        it('should register on first contact and return the same row afterwards', async () => {
            const first = await store.ensureUser(77);
            const second = await store.ensureUser(77);

            expect(second.createdAt.getTime()).toBe(first.createdAt.getTime());
            expect((await store.listUsersWithAccounts()).length).toBe(1);
        });

        it('should update the profile and admin flag', async () => {
            await store.createUser({ telegramId: 42 });

            await store.updateUserProfile(42, { username: 'alice', firstName: 'Alice' });
            const admin = await store.setUserAdmin(42, true);

            expect(admin.username).toBe('alice');
            expect(admin.firstName).toBe('Alice');
            expect(admin.isAdmin).toBe(true);
        });

        it('should raise NotFound when updating a missing user profile', async () => {
            await expect(store.updateUserProfile(5, { username: 'ghost' })).rejects.toBeInstanceOf(NotFound);
        });

        it('should assign and clear a plan', async () => {
            const plan = await store.createPlan({ name: 'Pro', maxAccounts: 3 });
            await store.createUser({ telegramId: 42 });
            const expiry = new Date('2030-06-01T12:00:00.000Z');

            const assigned = await store.updateUserPlan(42, plan.id, expiry);
            expect(assigned.planId).toBe(plan.id);
            expect(assigned.planExpiry?.toISOString()).toBe('2030-06-01T12:00:00.000Z');

            const cleared = await store.updateUserPlan(42, null, null);
            expect(cleared.planId).toBeNull();
            expect(cleared.planExpiry).toBeNull();
        });

        it('should raise NotFound for a missing plan or user on plan update', async () => {
            await store.createUser({ telegramId: 42 });

            await expect(store.updateUserPlan(42, 99, null)).rejects.toMatchObject({
                name: 'NotFound',
                entity: 'plan',
            });
            await expect(store.updateUserPlan(7, 1, null)).rejects.toMatchObject({
                name: 'NotFound',
                entity: 'user',
            });
            expect((await store.getUser(42))?.planId).toBeNull();
        });

        it('should list users with their accounts ordered by id', async () => {
            await store.createUser({ telegramId: 20 });
            await store.createUser({ telegramId: 10 });
            await store.createAccount({ userId: 20, phoneNumber: '+2000' });
            await store.createAccount({ userId: 10, phoneNumber: '+1000' });
            await store.createAccount({ userId: 20, phoneNumber: '+2001' });

            const listed = await store.listUsersWithAccounts();

            expect(listed.map((user) => user.telegramId)).toEqual([10, 20]);
            expect(listed[0].accounts.map((account) => account.phoneNumber)).toEqual(['+1000']);
            expect(listed[1].accounts.map((account) => account.phoneNumber)).toEqual(['+2000', '+2001']);
        });
    });

    describe('accounts', () => {
        beforeEach(async () => {
            await store.createUser({ telegramId: 42 });
            await store.createUser({ telegramId: 43 });
        });

        it('should create an account with defaults', async () => {
            const account = await store.createAccount({
                userId: 42,
                phoneNumber: '+9647700000001',
                deviceId: 'device-1',
                accessToken: 'test-access',
                refreshToken: 'test-refresh',
            });

            expect(account).toMatchObject({
                id: 1,
                userId: 42,
                phoneNumber: '+9647700000001',
                deviceId: 'device-1',
                cookie: null,
                accessToken: 'test-access',
                refreshToken: 'test-refresh',
                currentBalance: 0,
                lastBalanceUpdate: null,
                tokenUpdatedAt: null,
                isPrimaryReceiver: false,
            });
        });

        it('should reject a phone number already linked by another user', async () => {
            await store.createAccount({ userId: 42, phoneNumber: '+1000' });

            const error = await store.createAccount({ userId: 43, phoneNumber: '+1000' }).catch((err: unknown) => err);

            expect(error).toBeInstanceOf(UniqueConstraintViolation);
            expect(error).toMatchObject({
                code: 'UNIQUE_VIOLATION',
                details: { constraint: 'accounts_phone_number_unique' },
            });
            expect(await store.listUserAccounts(43)).toEqual([]);
        });

        it('should reject an account for a missing user and create no row', async () => {
            await expect(store.createAccount({ userId: 999, phoneNumber: '+1000' }))
                .rejects.toBeInstanceOf(ForeignKeyViolation);
            expect(await store.listAllAccounts()).toEqual([]);
        });

        it('should reject a malformed phone number before writing', async () => {
            await expect(store.createAccount({ userId: 42, phoneNumber: 'not-a-phone' }))
                .rejects.toBeInstanceOf(ZodError);
        });

        it('should look accounts up by id and phone number', async () => {
            const account = await store.createAccount({ userId: 42, phoneNumber: '+1000' });

            expect((await store.getAccount(account.id))?.phoneNumber).toBe('+1000');
            expect((await store.getAccountByPhone('+1000'))?.id).toBe(account.id);
            expect(await store.getAccountByPhone('+1999')).toBeNull();
            expect(await store.countUserAccounts(42)).toBe(1);
            expect(await store.countUserAccounts(43)).toBe(0);
        });

        it('should scope a phone lookup to its owner when a user is given', async () => {
            const account = await store.createAccount({ userId: 42, phoneNumber: '+1000' });

            expect((await store.getAccountByPhone('+1000', 42))?.id).toBe(account.id);
            expect(await store.getAccountByPhone('+1000', 43)).toBeNull();
        });

        it("should not delete another user's account when scoped to a user", async () => {
            const account = await store.createAccount({ userId: 42, phoneNumber: '+1000' });

            expect(await store.deleteAccount(account.id, 43)).toBe(false);
            expect(await store.getAccount(account.id)).not.toBeNull();
            expect(await store.deleteAccount(account.id, 42)).toBe(true);
            expect(await store.getAccount(account.id)).toBeNull();
        });

        it('should delete a single account', async () => {
            const account = await store.createAccount({ userId: 42, phoneNumber: '+1000' });

            expect(await store.deleteAccount(account.id)).toBe(true);
            expect(await store.deleteAccount(account.id)).toBe(false);
            expect(await store.getUser(42)).not.toBeNull();
        });

        it('should update tokens without touching other accounts', async () => {
            const target = await store.createAccount({ userId: 42, phoneNumber: '+1000', accessToken: 'old' });
            const other = await store.createAccount({ userId: 42, phoneNumber: '+1001', accessToken: 'other' });
            const at = new Date('2030-01-02T03:04:05.000Z');

            const updated = await store.updateAccountTokens(
                target.id,
                { accessToken: 'test-access-2', refreshToken: 'test-refresh-2' },
                at
            );

            expect(updated.accessToken).toBe('test-access-2');
            expect(updated.refreshToken).toBe('test-refresh-2');
            expect(updated.tokenUpdatedAt?.toISOString()).toBe('2030-01-02T03:04:05.000Z');
            expect((await store.getAccount(other.id))?.accessToken).toBe('other');
            expect((await store.getAccount(other.id))?.tokenUpdatedAt).toBeNull();
        });

        it('should stamp token and balance updates with the database clock when no time is given', async () => {
            const account = await store.createAccount({ userId: 42, phoneNumber: '+1000' });

            const withTokens = await store.updateAccountTokens(account.id, { accessToken: 'a', refreshToken: 'r' });
            const withBalance = await store.updateAccountBalance(account.id, 2500);

            expect(withTokens.tokenUpdatedAt).toBeInstanceOf(Date);
            expect(withBalance.lastBalanceUpdate).toBeInstanceOf(Date);
        });

        it('should keep database-stamped times correct outside UTC', async () => {
            await testDb.client.exec("SET TIME ZONE INTERVAL '+03:00' HOUR TO MINUTE");
            try {
                const user = await store.createUser({ telegramId: 44 });
                const account = await store.createAccount({ userId: 44, phoneNumber: '+1000' });
                const withTokens = await store.updateAccountTokens(account.id, { accessToken: 'a', refreshToken: 'r' });
                const withBalance = await store.updateAccountBalance(account.id, 10);

                const stamped = [user.createdAt, withTokens.tokenUpdatedAt, withBalance.lastBalanceUpdate];
                for (const value of stamped) {
                    expect(value).toBeInstanceOf(Date);
                    expect(Math.abs((value?.getTime() ?? 0) - Date.now())).toBeLessThan(60_000);
                }
            } finally {
                await testDb.client.exec('RESET TIME ZONE');
            }
        });

        it('should cache a polled balance', async () => {
            const account = await store.createAccount({ userId: 42, phoneNumber: '+1000' });
            const at = new Date('2030-01-02T00:00:00.000Z');

            const updated = await store.updateAccountBalance(account.id, 12.5, at);

            expect(updated.currentBalance).toBe(12.5);
            expect(updated.lastBalanceUpdate?.toISOString()).toBe('2030-01-02T00:00:00.000Z');
        });

        it('should raise NotFound for token or balance updates on a missing account', async () => {
            await expect(store.updateAccountTokens(5, { accessToken: null, refreshToken: null }))
                .rejects.toBeInstanceOf(NotFound);
            await expect(store.updateAccountBalance(5, 1)).rejects.toBeInstanceOf(NotFound);
        });

        it('should flag primary receivers without clearing other rows', async () => {
            const first = await store.createAccount({ userId: 42, phoneNumber: '+1000' });
            const second = await store.createAccount({ userId: 42, phoneNumber: '+1001' });

            await store.setPrimaryReceiver(42, first.id);
            await store.setPrimaryReceiver(42, second.id);

            const flags = (await store.listUserAccounts(42)).map((account) => account.isPrimaryReceiver);
            expect(flags).toEqual([true, true]);
            expect((await store.getPrimaryReceiver(42))?.id).toBe(first.id);
            expect(await store.clearPrimaryReceivers(42)).toBe(2);
            expect(await store.getPrimaryReceiver(42)).toBeNull();
        });

        it('should not flag an account that belongs to another user', async () => {
            const account = await store.createAccount({ userId: 43, phoneNumber: '+1000' });

            await expect(store.setPrimaryReceiver(42, account.id)).rejects.toBeInstanceOf(NotFound);
            expect((await store.getAccount(account.id))?.isPrimaryReceiver).toBe(false);
        });
    });

    describe('cascade delete', () => {
        it('should remove every account of a deleted user and nothing else', async () => {
            await store.createUser({ telegramId: 42 });
            await store.createUser({ telegramId: 43 });
            const owned = [
                await store.createAccount({ userId: 42, phoneNumber: '+1000' }),
                await store.createAccount({ userId: 42, phoneNumber: '+1001' }),
                await store.createAccount({ userId: 42, phoneNumber: '+1002' }),
            ];
            const kept = await store.createAccount({ userId: 43, phoneNumber: '+2000' });

            expect(await store.deleteUser(42)).toBe(true);

            expect(await store.countUserAccounts(42)).toBe(0);
            for (const account of owned) {
                expect(await store.getAccount(account.id)).toBeNull();
            }
            expect((await store.getAccount(kept.id))?.userId).toBe(43);
        });

        it('should report false when deleting a missing user', async () => {
            expect(await store.deleteUser(404)).toBe(false);
        });
    });

    describe('transactions', () => {
        it('should roll back every write when one fails', async () => {
            const attempt = store.transaction(async (tx) => {
                await tx.createUser({ telegramId: 7 });
                await tx.createAccount({ userId: 7, phoneNumber: '+1000' });
                await tx.createAccount({ userId: 7, phoneNumber: '+1000' });
            });

            await expect(attempt).rejects.toBeInstanceOf(UniqueConstraintViolation);
            expect(await store.getUser(7)).toBeNull();
            expect(await store.getAccountByPhone('+1000')).toBeNull();
        });

        it('should commit when the callback resolves', async () => {
            const account = await store.transaction(async (tx) => {
                await tx.createUser({ telegramId: 7 });
                return tx.createAccount({ userId: 7, phoneNumber: '+1000' });
            });

            expect((await store.getAccount(account.id))?.userId).toBe(7);
        });
    });

    describe('pro plan walkthrough', () => {
        it('should enforce phone uniqueness and cascade on user deletion', async () => {
            const pro = await store.createPlan({ name: 'Pro', maxAccounts: 3 });
            await store.createUser({ telegramId: 42, planId: pro.id });

            const first = await store.createAccount({ userId: 42, phoneNumber: '+1000' });
            const second = await store.createAccount({ userId: 42, phoneNumber: '+1001' });
            expect(await store.countUserAccounts(42)).toBe(2);

            await expect(store.createAccount({ userId: 42, phoneNumber: '+1000' }))
                .rejects.toBeInstanceOf(UniqueConstraintViolation);
            expect(await store.countUserAccounts(42)).toBe(2);

            await store.deleteUser(42);

            expect(await store.getAccount(first.id)).toBeNull();
            expect(await store.getAccount(second.id)).toBeNull();
        });
    });
});
