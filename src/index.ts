import { loadSessionConfig } from "./control-plane/session_config";
import { SqlitePolicyIndex } from "./lattice/policy_index";
import { createLogger } from "./logger";
import { createCompletionCapability } from "./providers/provider_config";
import { MemoryControlPlaneStore, type ControlPlaneStore } from "./store/control_plane_store";
import { SqliteControlPlaneStore } from "./store/sqlite_control_plane_store";
import { buildApp } from "./app";

const log = createLogger();

async function main() {
  // Fails fast on bad ORCH_* values.
  const config = loadSessionConfig();

  const dbPath = process.env.CONTROL_PLANE_DB_PATH;
  const store: ControlPlaneStore = dbPath
    ? new SqliteControlPlaneStore(dbPath)
    : new MemoryControlPlaneStore();
  const index = new SqlitePolicyIndex({ dbPath: process.env.POLICY_INDEX_DB_PATH });

  const app = buildApp({
    store,
    index,
    completion: createCompletionCapability({ logger: log }),
    config,
    logger: log,
  });

  log.info(
    { evt: "server.config", store: dbPath ? "sqlite" : "memory", ...config },
    "server.config"
  );

  const port = Number(process.env.PORT ?? 3333);
  await app.listen({ port, host: "0.0.0.0" });
}

main().catch((err) => {
  log.error({ evt: "server.crashed", error: err instanceof Error ? err.message : String(err) }, "server.crashed");
  process.exit(1);
});
