import path from "path";
import { promises as fs } from "fs";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { CheckConfig, PipelineConfig, PipelineConfigSchema } from "./pipelineConfig";
import { ConfigurationError } from "../errors";

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`).join("; ");
}

export function parsePipelineConfig(data: unknown, label = "pipeline config"): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`${label} is invalid: ${formatZodError(parsed.error)}`);
  }

  const layerNames = parsed.data.layers.map((layer) => layer.name);
  const duplicate = layerNames.find((name, index) => layerNames.indexOf(name) !== index);
  if (duplicate) {
    throw new ConfigurationError(`${label} declares layer "${duplicate}" twice`);
  }
  return parsed.data;
}

/**
 * Loads a YAML or JSON pipeline config. Relative roots and store paths are
 * resolved against the config file's directory.
 */
export async function loadPipelineConfig(configPath: string): Promise<PipelineConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config ${configPath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = /\.ya?ml$/i.test(configPath) ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot parse config ${configPath}: ${reason}`);
  }

  const config = parsePipelineConfig(data, configPath);
  const baseDir = path.dirname(path.resolve(configPath));
  const resolveCheck = (check: CheckConfig): CheckConfig =>
    check.type === "reference" && check.values_path
      ? { ...check, values_path: path.resolve(baseDir, check.values_path) }
      : check;

  const entities: PipelineConfig["entities"] = {};
  for (const [name, entity] of Object.entries(config.entities)) {
    entities[name] = { ...entity, checks: entity.checks.map(resolveCheck) };
  }

  return {
    ...config,
    bronze_root: path.resolve(baseDir, config.bronze_root),
    warehouse_root: path.resolve(baseDir, config.warehouse_root),
    manifest:
      config.manifest.driver === "file"
        ? { ...config.manifest, path: path.resolve(baseDir, config.manifest.path) }
        : config.manifest,
    entities
  };
}
