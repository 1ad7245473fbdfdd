/**
 * Database Connection
 *
 * Purpose:
 * Builds the Drizzle ORM client over Neon's HTTP driver. Only DbStorage
 * holds one; everything else goes through the storage interface.
 *
 * Layer: Infrastructure
 */

import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";

export function createDb(databaseUrl: string) {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  const queryClient = neon(databaseUrl);
  return drizzle(queryClient);
}

export type Database = ReturnType<typeof createDb>;
