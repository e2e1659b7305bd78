import fs from 'fs-extra';
import type { Query } from '../types';

/**
 * Ground truth side table: entry id -> cluster id. Kept apart from the
 * entries so labels can be swapped without touching the store.
 */
export class ClusterMap {
  private byEntry = new Map<number, number>();

  set(entryId: number, clusterId: number): void {
    this.byEntry.set(entryId, clusterId);
  }

  get(entryId: number): number | undefined {
    return this.byEntry.get(entryId);
  }

  get size(): number {
    return this.byEntry.size;
  }

  clusterIds(): Set<number> {
    return new Set(this.byEntry.values());
  }

  isRelevant(entryId: number, query: Query): boolean {
    const cluster = this.byEntry.get(entryId);
    if (cluster === undefined) return false;
    return query.relevantClusters.includes(cluster);
  }

  /** Number of entries belonging to any of the query's relevant clusters. */
  relevantCount(query: Query): number {
    if (query.relevantClusters.length === 0) return 0;
    const wanted = new Set(query.relevantClusters);
    let n = 0;
    for (const cluster of this.byEntry.values()) if (wanted.has(cluster)) n += 1;
    return n;
  }

  /** Splits queries by whether every cluster they name has at least one entry. */
  partitionByCoverage(queries: Query[]): { covered: Query[]; uncovered: Query[] } {
    const present = this.clusterIds();
    const covered: Query[] = [];
    const uncovered: Query[] = [];
    for (const q of queries) {
      if (q.relevantClusters.every((c) => present.has(c))) covered.push(q);
      else uncovered.push(q);
    }
    return { covered, uncovered };
  }

  entries(): Array<[number, number]> {
    return Array.from(this.byEntry.entries()).sort((a, b) => a[0] - b[0]);
  }

  toTsv(): string {
    return this.entries().map(([entry, cluster]) => `${entry}\t${cluster}\n`).join('');
  }

  static fromTsv(content: string): ClusterMap {
    const map = new ClusterMap();
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      const [entry, cluster] = trimmed.split('\t');
      const entryId = Number(entry);
      const clusterId = Number(cluster);
      if (!Number.isInteger(entryId) || !Number.isInteger(clusterId)) continue;
      map.set(entryId, clusterId);
    }
    return map;
  }

  async write(file: string): Promise<void> {
    await fs.outputFile(file, this.toTsv());
  }
}
