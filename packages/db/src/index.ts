export { createDb, DEFAULT_DB_URL, type DbOptions } from "./client.js";
export { migrate } from "./migrate.js";
export { migrations } from "./schema.js";
export { upsertRun, upsertRunStatements, getRun, listRuns, parseStoredConfig } from "./runs.js";
export { LibsqlLedger } from "./ledger.js";
export { MemoryLedger } from "./memory.js";
