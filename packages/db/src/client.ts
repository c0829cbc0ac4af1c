/**
 * Database client creation.
 *
 * Reads RUBRIC_DB_URL and RUBRIC_DB_AUTH_TOKEN from environment by default;
 * without a URL the ledger lives in `runs/ledger.db`.
 */
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { createClient, type Client } from "@libsql/client";
import { migrate } from "./migrate.js";

export const DEFAULT_DB_URL = "file:runs/ledger.db";

export interface DbOptions {
  url?: string;
  authToken?: string;
}

export async function createDb(opts?: DbOptions): Promise<Client> {
  const url = opts?.url ?? process.env.RUBRIC_DB_URL ?? DEFAULT_DB_URL;
  const authToken = opts?.authToken ?? process.env.RUBRIC_DB_AUTH_TOKEN;

  const isRemote = url.startsWith("libsql://") || url.startsWith("https://") || url.startsWith("http://");
  const isMemory = url === ":memory:" || url === "file::memory:";

  if (!isRemote && !isMemory && url.startsWith("file:")) {
    await mkdir(dirname(url.slice("file:".length)), { recursive: true });
  }

  const client = createClient({ url, authToken });

  // WAL only applies to local SQLite files; FK enforcement to every local db.
  // PRAGMAs must run outside a transaction.
  if (!isRemote) {
    if (!isMemory) await client.execute("PRAGMA journal_mode=WAL");
    await client.execute("PRAGMA foreign_keys=ON");
  }

  await migrate(client);
  return client;
}
