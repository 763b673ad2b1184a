/**
 * Drizzle ORM schema for the Switchboard database.
 *
 * Used by drizzle.config.ts for migration generation and by createDb()
 * for query type inference.
 *
 * @module db/schema
 */
export * from './chat.js';
