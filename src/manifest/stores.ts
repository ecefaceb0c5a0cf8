import { PipelineConfig } from "../config/pipelineConfig";
import { closePool, getDb } from "../db/client";
import { DqResultLog, FileDqResultLog, PgDqResultLog } from "../dq/resultLog";
import { dqResultsLogPath } from "../io/paths";
import { FileManifestRegistry } from "./fileRegistry";
import { PgManifestRegistry } from "./pgRegistry";
import { ManifestRegistry } from "./registry";

export interface Stores {
  registry: ManifestRegistry;
  dqLog: DqResultLog;
  close(): Promise<void>;
}

export async function openStores(config: PipelineConfig): Promise<Stores> {
  if (config.manifest.driver === "postgres") {
    const db = getDb(config.manifest.url_env);
    const registry = new PgManifestRegistry(db, closePool);
    return {
      registry,
      dqLog: new PgDqResultLog(db),
      close: () => registry.close()
    };
  }

  const registry = await FileManifestRegistry.open(config.manifest.path);
  return {
    registry,
    dqLog: new FileDqResultLog(dqResultsLogPath(config.warehouse_root)),
    close: () => registry.close()
  };
}
