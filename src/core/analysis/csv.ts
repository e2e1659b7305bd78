import type { DistanceRecord } from '../types';

export const DISTANCE_CSV_HEADER = 'query_id,entry_id,l2_dist,cosine_dist,relevant';

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toDistanceCsv(records: DistanceRecord[]): string {
  const lines = [DISTANCE_CSV_HEADER];
  for (const r of records) {
    lines.push(`${csvField(r.queryId)},${r.entryId},${r.l2.toFixed(6)},${r.cosine.toFixed(6)},${r.relevant}`);
  }
  return lines.join('\n') + '\n';
}
