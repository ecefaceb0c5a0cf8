import { loadPipelineConfig } from "../config/loadConfig";
import { closePool, getDb } from "../db/client";
import { ConfigurationError } from "../errors";
import { PgManifestRegistry } from "../manifest/pgRegistry";
import { createLogger } from "../utils/logger";

export async function runInitDb(options: { configPath: string }): Promise<void> {
  const config = await loadPipelineConfig(options.configPath);
  if (config.manifest.driver !== "postgres") {
    throw new ConfigurationError("init-db needs manifest.driver: postgres");
  }
  const log = createLogger("init-db");
  const registry = new PgManifestRegistry(getDb(config.manifest.url_env), closePool);
  try {
    await registry.ensureSchema();
    log.info("db.schema_ready", { url_env: config.manifest.url_env });
  } finally {
    await registry.close();
  }
}
