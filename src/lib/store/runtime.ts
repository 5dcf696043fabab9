import { eq, sql } from "drizzle-orm";
import { getDb } from "@/db/client";
import { appRuntimeState } from "@/db/schema";
import type { AppConfig } from "@/lib/config";
import { ConfigError, InfrastructureError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { MemoryStore } from "@/lib/store/memory";
import type { AppState } from "@/lib/types";

const RUNTIME_STATE_ROW_ID = "singleton";

export type BackendMode = "memory" | "postgres";

let runtimeStore: MemoryStore | null = null;
let initPromise: Promise<MemoryStore> | null = null;
let persistQueue: Promise<void> = Promise.resolve();

export function getStateBackendMode(config: AppConfig): BackendMode {
  if (config.stateBackend === "postgres") {
    if (!config.databaseUrl) {
      throw new ConfigError("SCRIPTORIUM_STATE_BACKEND=postgres requires DATABASE_URL");
    }
    return "postgres";
  }

  if (config.stateBackend === "memory") {
    return "memory";
  }

  if (config.environment === "test") {
    return "memory";
  }

  if (config.databaseUrl) {
    return "postgres";
  }

  throw new ConfigError(
    "Persistent storage is required. Set DATABASE_URL or explicitly set SCRIPTORIUM_STATE_BACKEND=memory for ephemeral local runs."
  );
}

async function withDb<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof InfrastructureError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new InfrastructureError(`Failed to ${action}: ${message}`, { cause: error });
  }
}

async function ensureRuntimeStateTable(config: AppConfig) {
  const db = getDb(config.databaseUrl);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS app_runtime_state (
      id varchar(64) PRIMARY KEY,
      state_json jsonb NOT NULL,
      updated_at timestamptz NOT NULL
    )
  `);
}

async function loadStateFromPostgres(config: AppConfig): Promise<AppState | null> {
  return withDb("load runtime state", async () => {
    await ensureRuntimeStateTable(config);
    const db = getDb(config.databaseUrl);
    const rows = await db.select().from(appRuntimeState).where(eq(appRuntimeState.id, RUNTIME_STATE_ROW_ID)).limit(1);
    return rows[0]?.stateJson ?? null;
  });
}

async function saveStateToPostgres(config: AppConfig, state: AppState): Promise<void> {
  await withDb("save runtime state", async () => {
    await ensureRuntimeStateTable(config);
    const db = getDb(config.databaseUrl);
    const updatedAt = new Date();
    await db
      .insert(appRuntimeState)
      .values({ id: RUNTIME_STATE_ROW_ID, stateJson: state, updatedAt })
      .onConflictDoUpdate({
        target: appRuntimeState.id,
        set: {
          stateJson: state,
          updatedAt
        }
      });
  });
}

async function initializeRuntimeStore(config: AppConfig, logger?: Logger): Promise<MemoryStore> {
  const backend = getStateBackendMode(config);
  if (backend === "memory") {
    const store = new MemoryStore();
    runtimeStore = store;
    logger?.info("runtime store ready", { backend });
    return store;
  }

  const loadedState = await loadStateFromPostgres(config);
  const store = new MemoryStore(loadedState ?? undefined);
  runtimeStore = store;

  if (!loadedState) {
    await saveStateToPostgres(config, store.snapshotState());
  }
  logger?.info("runtime store ready", { backend, restored: loadedState !== null });
  return store;
}

export async function getRuntimeStore(config: AppConfig, logger?: Logger): Promise<MemoryStore> {
  if (runtimeStore) return runtimeStore;
  if (!initPromise) {
    initPromise = initializeRuntimeStore(config, logger).finally(() => {
      initPromise = null;
    });
  }
  return initPromise;
}

// Snapshots are taken synchronously and written in call order.
export async function persistRuntimeStore(config: AppConfig, store: MemoryStore): Promise<void> {
  if (getStateBackendMode(config) !== "postgres") return;
  const state = store.snapshotState();
  const write = persistQueue.then(() => saveStateToPostgres(config, state));
  // The caller still sees a failed write; later writes queue behind it regardless.
  persistQueue = write.catch(() => undefined);
  await write;
}

export async function clearRuntimeStateForTests(config: AppConfig) {
  runtimeStore = null;
  initPromise = null;
  if (getStateBackendMode(config) === "postgres") {
    await withDb("clear runtime state", async () => {
      await ensureRuntimeStateTable(config);
      const db = getDb(config.databaseUrl);
      await db.delete(appRuntimeState).where(eq(appRuntimeState.id, RUNTIME_STATE_ROW_ID));
    });
  }
}
