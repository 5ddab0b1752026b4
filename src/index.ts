/**
 * Linked Accounts Store
 *
 * Copyright (c) 2026 Rejourney
 *
 * Licensed under the Server Side Public License 1.0 (the "License");
 * you may not use this file except in compliance with the License.
 * See LICENSE-SSPL for full terms.
 */

export * from './db/schema.js';
export type { Database, Schema } from './db/database.js';
export {
    migrations,
    runMigrations,
    getSchemaVersion,
    getAppliedVersions,
    seedDefaultPlan,
    LATEST_SCHEMA_VERSION,
    type Migration,
    type MigrationResult,
} from './db/migrations.js';
export * from './errors.js';
export { Store, type AccountTokens, type UserWithAccounts } from './services/store.js';
export {
    grantSubscription,
    revokeSubscription,
    getEffectiveSubscription,
} from './services/subscriptions.js';
export {
    linkAccount,
    designatePrimaryReceiver,
    checkAccountCapacity,
    type AccountCapacityCheck,
} from './services/accountPolicy.js';
export * from './utils/plans.js';
export * from './validation/plans.js';
export * from './validation/users.js';
export * from './validation/accounts.js';
