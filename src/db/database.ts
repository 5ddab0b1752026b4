/**
 * Driver-agnostic database handle.
 *
 * Both the node-postgres client and the in-process PGlite client used by the
 * tests satisfy this type, as does a transaction opened on either.
 */

import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema.js';

export type Schema = typeof schema;

export type Database = PgDatabase<PgQueryResultHKT, Schema>;
