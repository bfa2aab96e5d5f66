/**
 * Durable session store on Postgres (Neon) via Drizzle.
 * Used instead of the in-memory store when DATABASE_URL is set, so threads
 * survive restarts and are shared across instances.
 */

import { eq, sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { genieSessions } from "@shared/schema";
import type { ISessionStore } from "./store";
import { logInfo } from "../utils/logger";

/**
 * Works over any drizzle Postgres driver; production passes neon-http.
 */
export class DbSessionStore<TQueryResult extends PgQueryResultHKT> implements ISessionStore {
  private ready: Promise<void> | null = null;

  constructor(private db: PgDatabase<TQueryResult>) {}

  private ensureTable(): Promise<void> {
    if (!this.ready) {
      this.ready = this.db
        .execute(sql`
          CREATE TABLE IF NOT EXISTS genie_sessions (
            user_id VARCHAR PRIMARY KEY,
            conversation_id VARCHAR NOT NULL,
            updated_at TIMESTAMP NOT NULL DEFAULT now()
          )
        `)
        .then(() => {
          logInfo("[Sessions] genie_sessions table ready");
        })
        .catch((error: unknown) => {
          // Allow the next call to try again
          this.ready = null;
          throw error;
        });
    }
    return this.ready;
  }

  async get(userId: string): Promise<string | undefined> {
    await this.ensureTable();
    const rows = await this.db
      .select({ conversationId: genieSessions.conversationId })
      .from(genieSessions)
      .where(eq(genieSessions.userId, userId))
      .limit(1);
    return rows[0]?.conversationId;
  }

  async put(userId: string, conversationId: string): Promise<void> {
    await this.ensureTable();
    await this.db
      .insert(genieSessions)
      .values({ userId, conversationId })
      .onConflictDoUpdate({
        target: genieSessions.userId,
        set: { conversationId, updatedAt: sql`now()` },
      });
  }
}
