/**
 * Applies the versioned schema migrations to DATABASE_URL and promotes
 * ADMIN_TELEGRAM_ID to admin when it is set.
 *
 * Usage: npm run db:migrate
 */

import { config } from '../src/config.js';
import { db, pool } from '../src/db/client.js';
import { runMigrations } from '../src/db/migrations.js';
import { logger } from '../src/logger.js';
import { Store } from '../src/services/store.js';

async function main() {
    const result = await runMigrations(db);
    logger.info(result, 'Database migrations complete');

    if (config.ADMIN_TELEGRAM_ID !== undefined) {
        const store = new Store(db);
        await store.ensureUser(config.ADMIN_TELEGRAM_ID);
        await store.setUserAdmin(config.ADMIN_TELEGRAM_ID, true);
    }
}

main()
    .catch((err) => {
        logger.error({ err }, 'Migration failed');
        process.exitCode = 1;
    })
    .finally(() => pool.end());
