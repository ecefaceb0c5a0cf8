import { Grain, RoutingRule } from "../config/pipelineConfig";
import { ConfigurationError } from "../errors";
import { PartitionKey, partitionKey } from "../types/partitionKey";
import { expandCoverage, parseCoverage } from "./coverage";

export type RouteMode = "exact" | "expand" | "collapse";

export interface RoutedPartition {
  key: PartitionKey;
  ruleId: string;
  mode: RouteMode;
  grain: Grain;
  sliceField: string | null;
  fieldMapping: Record<string, string>;
}

interface CompiledRule {
  rule: RoutingRule;
  pattern: RegExp;
}

function compileSourcePattern(source: string): RegExp {
  const escaped = source
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
}

/**
 * Declarative mapping from raw (source, partition) identifiers to canonical
 * partition keys. Immutable after construction.
 */
export class Router {
  private readonly rules: readonly CompiledRule[];

  constructor(rules: readonly RoutingRule[]) {
    if (rules.length === 0) {
      throw new ConfigurationError("Routing rule set is empty");
    }
    const seen = new Set<string>();
    for (const rule of rules) {
      if (seen.has(rule.id)) {
        throw new ConfigurationError(`Routing rule id "${rule.id}" is declared more than once`);
      }
      seen.add(rule.id);
    }
    this.rules = Object.freeze(
      rules.map((rule) => ({ rule: Object.freeze({ ...rule }), pattern: compileSourcePattern(rule.source) }))
    );
  }

  private matchingRules(rawSourceId: string): RoutingRule[] {
    return this.rules
      .filter(({ rule, pattern }) => rule.enabled && pattern.test(rawSourceId))
      .map(({ rule }) => rule);
  }

  resolve(rawSourceId: string, rawPartitionId: string): RoutedPartition[] {
    const rules = this.matchingRules(rawSourceId);
    if (rules.length === 0) {
      throw new ConfigurationError(`No routing rule matches source "${rawSourceId}"`);
    }
    const coverage = parseCoverage(rawPartitionId);
    if (!coverage) {
      throw new ConfigurationError(
        `Raw partition "${rawPartitionId}" of source "${rawSourceId}" has no recognised coverage (YYYY, YYYY-YYYY, YYYY-MM or YYYY-MM-YYYY-MM)`
      );
    }

    const routed: RoutedPartition[] = [];
    for (const rule of rules) {
      const partitions = expandCoverage(coverage, rule.grain);
      let mode: RouteMode;
      if (coverage.grain === "month" && rule.grain === "year") {
        mode = "collapse";
      } else {
        mode = partitions.length === 1 ? "exact" : "expand";
      }
      const source = rule.canonical_source ?? rawSourceId;
      for (const partition of partitions) {
        routed.push({
          key: partitionKey(source, rule.entity, partition),
          ruleId: rule.id,
          mode,
          grain: rule.grain,
          sliceField: rule.slice_field ?? null,
          fieldMapping: rule.field_mapping ?? {}
        });
      }
    }
    return routed;
  }

  resolveKeys(rawSourceId: string, rawPartitionId: string): PartitionKey[] {
    return this.resolve(rawSourceId, rawPartitionId).map((routed) => routed.key);
  }
}

/** Renames raw fields to their canonical names; unmapped fields pass through. */
export function applyFieldMapping(
  row: Record<string, unknown>,
  mapping: Record<string, string>
): Record<string, unknown> {
  if (Object.keys(mapping).length === 0) return row;
  const mapped: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(row)) {
    mapped[mapping[field] ?? field] = value;
  }
  return mapped;
}
