import { loadPipelineConfig } from "../config/loadConfig";
import { PipelineConfig, layerPolicies } from "../config/pipelineConfig";
import { Stores, openStores } from "../manifest/stores";
import { PromotionMachine } from "../promotion/stateMachine";
import { Logger, createLogger } from "../utils/logger";
import { Clock, systemClock } from "../utils/time";

export interface CommandIo {
  /** Receives one line of command output; stdout by default. */
  out?: (line: string) => void;
  logger?: Logger;
  clock?: Clock;
}

export interface PipelineContext {
  config: PipelineConfig;
  stores: Stores;
  machine: PromotionMachine;
  log: Logger;
  clock: Clock;
  out: (line: string) => void;
}

export async function openPipeline(configPath: string, command: string, io: CommandIo = {}): Promise<PipelineContext> {
  const config = await loadPipelineConfig(configPath);
  const log = io.logger ?? createLogger(command);
  const clock = io.clock ?? systemClock;
  const stores = await openStores(config);
  const machine = new PromotionMachine({
    registry: stores.registry,
    dqLog: stores.dqLog,
    policies: layerPolicies(config),
    warehouseRoot: config.warehouse_root,
    maxConflictRetries: config.max_conflict_retries,
    retryDelayMs: config.retry_delay_ms,
    clock,
    logger: log
  });
  return { config, stores, machine, log, clock, out: io.out ?? ((line) => console.log(line)) };
}
