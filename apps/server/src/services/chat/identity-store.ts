/**
 * Drizzle-backed identity directory.
 *
 * API keys are stored as issued and never returned by lookups; the only time
 * a key leaves the store is in the result of `create()`.
 *
 * @module services/chat/identity-store
 */
import { randomBytes } from 'crypto';
import { asc, eq, users, type Db } from '@switchboard/db';
import type { IdentityDirectoryLike } from '@switchboard/delivery';
import type { Identity, Role } from '@switchboard/shared/chat-schemas';
import { ulid } from 'ulidx';
import { ConflictError, NotFoundError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

export interface NewIdentity {
  username: string;
  role: Role;
  webhookUrl?: string | null;
  logo?: string | null;
  emoji?: string | null;
  /** Username of the creator, for bots. */
  createdBy?: string | null;
}

export interface IssuedIdentity {
  identity: Identity;
  apiKey: string;
}

type UserRow = typeof users.$inferSelect;

function toIdentity(row: UserRow): Identity {
  return {
    id: row.id,
    username: row.username,
    role: row.role,
    webhookUrl: row.webhookUrl,
    logo: row.logo,
    emoji: row.emoji,
    createdBy: row.createdBy,
    createdAt: row.createdAt,
  };
}

/** 32 random bytes as 64 hex characters. */
export function generateApiKey(): string {
  return randomBytes(32).toString('hex');
}

export class IdentityStore implements IdentityDirectoryLike {
  constructor(private readonly db: Db) {}

  /** @throws ConflictError when the username is taken */
  create(input: NewIdentity): IssuedIdentity {
    if (this.getByUsername(input.username)) {
      throw new ConflictError(`Username '${input.username}' is already taken`);
    }

    const apiKey = generateApiKey();
    const row = this.db
      .insert(users)
      .values({
        id: ulid(),
        username: input.username,
        apiKey,
        role: input.role,
        webhookUrl: input.webhookUrl ?? null,
        logo: input.logo ?? null,
        emoji: input.emoji ?? null,
        createdBy: input.createdBy ?? null,
        createdAt: new Date().toISOString(),
      })
      .returning()
      .get();
    if (!row) throw new Error(`Insert of ${input.username} returned no row`);

    logger.info(`[DB] Registered ${input.role} ${input.username}`);
    return { identity: toIdentity(row), apiKey };
  }

  getByUsername(username: string): Identity | null {
    const row = this.db.select().from(users).where(eq(users.username, username)).get();
    return row ? toIdentity(row) : null;
  }

  getByApiKey(apiKey: string): Identity | null {
    if (!apiKey) return null;
    const row = this.db.select().from(users).where(eq(users.apiKey, apiKey)).get();
    return row ? toIdentity(row) : null;
  }

  list(): Identity[] {
    return this.db.select().from(users).orderBy(asc(users.username)).all().map(toIdentity);
  }

  updateWebhook(username: string, webhookUrl: string | null): Identity {
    return this.update(username, { webhookUrl });
  }

  assignRole(username: string, role: Role): Identity {
    const identity = this.update(username, { role });
    logger.info(`[DB] ${username} is now ${role}`);
    return identity;
  }

  private update(username: string, changes: Partial<Pick<UserRow, 'webhookUrl' | 'role'>>): Identity {
    const row = this.db.update(users).set(changes).where(eq(users.username, username)).returning().get();
    if (!row) throw new NotFoundError(`User '${username}' not found`);
    return toIdentity(row);
  }
}
