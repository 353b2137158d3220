import { closeDbPool, getDb } from "@/db/client";
import { loadEngineConfig } from "@/lib/config";
import { LabelingEngine, type EngineHooks } from "@/lib/engine";
import type { EngineStore, StoreBackend } from "@/lib/store/interface";
import { MemoryStore } from "@/lib/store/memory";
import { PostgresStore } from "@/lib/store/postgres";

let runtimeEngine: LabelingEngine | null = null;
let initPromise: Promise<LabelingEngine> | null = null;

export function getStateBackendMode(env: NodeJS.ProcessEnv = process.env): StoreBackend {
  const configured = (env.LABELING_STATE_BACKEND || "").trim().toLowerCase();
  const isTest = env.NODE_ENV === "test";

  if (configured === "postgres") {
    if (!env.DATABASE_URL) {
      throw new Error("LABELING_STATE_BACKEND=postgres requires DATABASE_URL");
    }
    return "postgres";
  }

  if (configured === "memory") {
    return "memory";
  }

  if (isTest) {
    return "memory";
  }

  if (env.DATABASE_URL) {
    return "postgres";
  }

  throw new Error(
    "Persistent storage is required. Set DATABASE_URL (recommended) or explicitly set LABELING_STATE_BACKEND=memory for ephemeral local development."
  );
}

export function createRuntimeStore(backend: StoreBackend = getStateBackendMode()): EngineStore {
  if (backend === "memory") {
    return new MemoryStore();
  }
  return new PostgresStore(getDb(), closeDbPool);
}

async function initializeRuntimeEngine(hooks?: EngineHooks): Promise<LabelingEngine> {
  const engine = new LabelingEngine({
    store: createRuntimeStore(),
    config: loadEngineConfig(),
    hooks
  });
  await engine.start();
  runtimeEngine = engine;
  return engine;
}

export async function getRuntimeEngine(hooks?: EngineHooks): Promise<LabelingEngine> {
  if (runtimeEngine) return runtimeEngine;
  if (!initPromise) {
    initPromise = initializeRuntimeEngine(hooks).finally(() => {
      initPromise = null;
    });
  }
  return initPromise;
}

export async function closeRuntimeEngine(): Promise<void> {
  const engine = runtimeEngine;
  runtimeEngine = null;
  if (engine) {
    await engine.close();
  }
}
