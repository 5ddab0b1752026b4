/**
 * Versioned Schema Migrations
 *
 * The schema evolves through explicit, ordered steps recorded in the
 * `schema_migrations` ledger:
 * - v1: users + accounts (minimal variant)
 * - v2: plans catalog, user profile/plan columns, primary receiver flag,
 *       default Free plan
 *
 * Each step runs in its own transaction together with its ledger row, so a
 * failed step leaves the database at the previous version. Every transaction
 * first takes a transaction-scoped advisory lock, so concurrent runners
 * apply each step once.
 */

import { asc, eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from './database.js';
import { plans, schemaMigrations } from './schema.js';
import { createComponentLogger } from '../logger.js';
import { FREE_PLAN } from '../utils/plans.js';

const log = createComponentLogger('migrations');

export interface Migration {
    version: number;
    name: string;
    statements: string[];
    seed?: (db: Database) => Promise<unknown>;
}

export interface MigrationResult {
    applied: number[];
    currentVersion: number;
}

export const migrations: Migration[] = [
    {
        version: 1,
        name: 'minimal_schema',
        statements: [
            `CREATE TABLE IF NOT EXISTS users (
                telegram_id BIGINT PRIMARY KEY,
                is_admin BOOLEAN NOT NULL DEFAULT FALSE,
                created_at TIMESTAMPTZ NOT NULL DEFAULT now()
            )`,
            `CREATE TABLE IF NOT EXISTS accounts (
                id SERIAL PRIMARY KEY,
                user_id BIGINT NOT NULL,
                phone_number TEXT NOT NULL,
                device_id TEXT,
                cookie TEXT,
                access_token TEXT,
                refresh_token TEXT,
                current_balance DOUBLE PRECISION NOT NULL DEFAULT 0,
                last_balance_update TIMESTAMPTZ,
                token_updated_at TIMESTAMPTZ,
                CONSTRAINT accounts_phone_number_unique UNIQUE (phone_number),
                CONSTRAINT accounts_user_id_users_telegram_id_fk
                    FOREIGN KEY (user_id) REFERENCES users (telegram_id) ON DELETE CASCADE
            )`,
            `CREATE INDEX IF NOT EXISTS accounts_user_id_idx ON accounts (user_id)`,
        ],
    },
    {
        version: 2,
        name: 'plans_and_profiles',
        statements: [
            `CREATE TABLE IF NOT EXISTS plans (
                id SERIAL PRIMARY KEY,
                name TEXT NOT NULL,
                price DOUBLE PRECISION NOT NULL DEFAULT 0,
                max_accounts INTEGER NOT NULL DEFAULT 1,
                description TEXT,
                duration_days INTEGER NOT NULL DEFAULT 30
            )`,
            `ALTER TABLE users ADD COLUMN IF NOT EXISTS username TEXT`,
            `ALTER TABLE users ADD COLUMN IF NOT EXISTS first_name TEXT`,
            `ALTER TABLE users ADD COLUMN IF NOT EXISTS plan_id INTEGER
                CONSTRAINT users_plan_id_plans_id_fk REFERENCES plans (id)`,
            `ALTER TABLE users ADD COLUMN IF NOT EXISTS plan_expiry TIMESTAMPTZ`,
            `ALTER TABLE accounts ADD COLUMN IF NOT EXISTS is_primary_receiver BOOLEAN NOT NULL DEFAULT FALSE`,
        ],
        seed: (db) => seedDefaultPlan(db),
    },
];

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version;

// Arbitrary key shared by every process running migrations against a database
export const MIGRATION_LOCK_KEY = 7_240_311_505;

const LEDGER_DDL = `CREATE TABLE IF NOT EXISTS schema_migrations (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`;

// Both node-postgres and PGlite return `{ rows: [...] }` from execute()
const tableExistsResult = z.object({
    rows: z.array(z.object({ present: z.boolean() })).length(1),
});

async function tableExists(db: Database, table: string): Promise<boolean> {
    const qualifiedName = `public.${table}`;
    const result: unknown = await db.execute(
        sql`SELECT to_regclass(${qualifiedName}) IS NOT NULL AS present`
    );
    return tableExistsResult.parse(result).rows[0].present;
}

export async function getAppliedVersions(db: Database): Promise<number[]> {
    if (!(await tableExists(db, 'schema_migrations'))) {
        return [];
    }
    const rows = await db
        .select({ version: schemaMigrations.version })
        .from(schemaMigrations)
        .orderBy(asc(schemaMigrations.version));
    return rows.map((row) => row.version);
}

/**
 * Highest applied version, 0 for an empty database.
 */
export async function getSchemaVersion(db: Database): Promise<number> {
    const versions = await getAppliedVersions(db);
    return versions.length > 0 ? Math.max(...versions) : 0;
}

/**
 * Record the steps a database created before the ledger already has.
 */
async function adoptLegacySchema(db: Database): Promise<void> {
    const [ledgerRow] = await db.select({ version: schemaMigrations.version }).from(schemaMigrations).limit(1);
    if (ledgerRow) {
        return;
    }

    const adopted: Migration[] = [];
    if (await tableExists(db, 'users')) {
        adopted.push(migrations[0]);
        if (await tableExists(db, 'plans')) {
            adopted.push(migrations[1]);
        }
    }

    for (const migration of adopted) {
        await db.insert(schemaMigrations).values({ version: migration.version, name: migration.name });
    }
    if (adopted.length > 0) {
        log.info({ versions: adopted.map((m) => m.version) }, 'Adopted existing schema into migration ledger');
    }
}

/**
 * Insert the Free plan when the catalog is empty.
 */
export async function seedDefaultPlan(db: Database): Promise<boolean> {
    const [existing] = await db.select({ id: plans.id }).from(plans).limit(1);
    if (existing) {
        return false;
    }

    await db.insert(plans).values({
        name: FREE_PLAN.name,
        price: 0,
        maxAccounts: FREE_PLAN.maxAccounts,
        description: FREE_PLAN.description,
        durationDays: FREE_PLAN.durationDays,
    });
    log.info('Seeded default plan');
    return true;
}

async function acquireMigrationLock(tx: Database): Promise<void> {
    await tx.execute(sql`SELECT pg_advisory_xact_lock(${MIGRATION_LOCK_KEY}::bigint)`);
}

async function isApplied(tx: Database, version: number): Promise<boolean> {
    const [row] = await tx
        .select({ version: schemaMigrations.version })
        .from(schemaMigrations)
        .where(eq(schemaMigrations.version, version))
        .limit(1);
    return row !== undefined;
}

export async function runMigrations(
    db: Database,
    options: { targetVersion?: number } = {}
): Promise<MigrationResult> {
    const targetVersion = options.targetVersion ?? LATEST_SCHEMA_VERSION;

    await db.transaction(async (tx) => {
        await acquireMigrationLock(tx);
        await tx.execute(sql.raw(LEDGER_DDL));
        await adoptLegacySchema(tx);
    });

    const applied: number[] = [];

    for (const migration of migrations) {
        if (migration.version > targetVersion) {
            break;
        }

        // Another runner may have applied the step while this one waited on the lock
        const didApply = await db.transaction(async (tx) => {
            await acquireMigrationLock(tx);
            if (await isApplied(tx, migration.version)) {
                return false;
            }
            for (const statement of migration.statements) {
                await tx.execute(sql.raw(statement));
            }
            if (migration.seed) {
                await migration.seed(tx);
            }
            await tx.insert(schemaMigrations).values({ version: migration.version, name: migration.name });
            return true;
        });

        if (didApply) {
            applied.push(migration.version);
            log.info({ version: migration.version, name: migration.name }, 'Applied migration');
        }
    }

    const currentVersion = await getSchemaVersion(db);
    if (applied.length === 0) {
        log.debug({ currentVersion }, 'Schema already up to date');
    }

    return { applied, currentVersion };
}
