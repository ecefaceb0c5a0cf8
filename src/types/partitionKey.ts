export interface PartitionKey {
  readonly source: string;
  readonly entity: string;
  readonly partition: string;
}

export function partitionKey(source: string, entity: string, partition: string): PartitionKey {
  return Object.freeze({ source, entity, partition });
}

export function partitionKeyId(key: PartitionKey): string {
  return `${key.source}/${key.entity}/${key.partition}`;
}

export function comparePartitionKeys(a: PartitionKey, b: PartitionKey): number {
  return (
    a.entity.localeCompare(b.entity) ||
    a.partition.localeCompare(b.partition) ||
    a.source.localeCompare(b.source)
  );
}

export function samePartitionKey(a: PartitionKey, b: PartitionKey): boolean {
  return a.source === b.source && a.entity === b.entity && a.partition === b.partition;
}
