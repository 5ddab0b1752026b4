/**
 * Drizzle ORM Database Schema
 *
 * Mirrors the tables produced by the versioned steps in migrations.ts
 * (current version: plans, users, accounts). Timestamps are TIMESTAMPTZ so
 * values stamped by the database and values supplied by callers compare as
 * the same instants whatever the session time zone.
 */

import {
    pgTable,
    serial,
    text,
    boolean,
    integer,
    bigint,
    doublePrecision,
    timestamp,
    index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// =============================================================================
// Plan Catalog
// =============================================================================

export const plans = pgTable('plans', {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    price: doublePrecision('price').default(0).notNull(),
    maxAccounts: integer('max_accounts').default(1).notNull(),
    description: text('description'),
    durationDays: integer('duration_days').default(30).notNull(),
});

// =============================================================================
// Users
// =============================================================================

export const users = pgTable('users', {
    // Messaging-platform id; ids exceed 2^31 so bigint is required
    telegramId: bigint('telegram_id', { mode: 'number' }).primaryKey(),
    isAdmin: boolean('is_admin').default(false).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    username: text('username'),
    firstName: text('first_name'),
    planId: integer('plan_id').references(() => plans.id),
    planExpiry: timestamp('plan_expiry', { withTimezone: true }),
});

// =============================================================================
// Linked Accounts
// =============================================================================

export const accounts = pgTable(
    'accounts',
    {
        id: serial('id').primaryKey(),
        userId: bigint('user_id', { mode: 'number' })
            .notNull()
            .references(() => users.telegramId, { onDelete: 'cascade' }),
        phoneNumber: text('phone_number').unique().notNull(),
        deviceId: text('device_id'),
        cookie: text('cookie'),
        accessToken: text('access_token'),
        refreshToken: text('refresh_token'),
        currentBalance: doublePrecision('current_balance').default(0).notNull(),
        lastBalanceUpdate: timestamp('last_balance_update', { withTimezone: true }),
        tokenUpdatedAt: timestamp('token_updated_at', { withTimezone: true }),
        isPrimaryReceiver: boolean('is_primary_receiver').default(false).notNull(),
    },
    (table) => [
        index('accounts_user_id_idx').on(table.userId),
    ]
);

// =============================================================================
// Migration Ledger
// =============================================================================

export const schemaMigrations = pgTable('schema_migrations', {
    version: integer('version').primaryKey(),
    name: text('name').notNull(),
    appliedAt: timestamp('applied_at', { withTimezone: true }).defaultNow().notNull(),
});

// =============================================================================
// Relations
// =============================================================================

export const plansRelations = relations(plans, ({ many }) => ({
    users: many(users),
}));

export const usersRelations = relations(users, ({ one, many }) => ({
    plan: one(plans, {
        fields: [users.planId],
        references: [plans.id],
    }),
    accounts: many(accounts),
}));

export const accountsRelations = relations(accounts, ({ one }) => ({
    user: one(users, {
        fields: [accounts.userId],
        references: [users.telegramId],
    }),
}));

// =============================================================================
// Row Types
// =============================================================================

export type Plan = typeof plans.$inferSelect;
export type NewPlan = typeof plans.$inferInsert;
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type SchemaMigration = typeof schemaMigrations.$inferSelect;
