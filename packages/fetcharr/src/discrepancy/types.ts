import { z } from 'zod';

export const discrepancyRecordSchema = z.object({
  showTitle: z.string(),
  externalShowId: z.string(),
  requestId: z.number().int().optional(),
  seasonNumber: z.number().int(),
  totalEpisodeCount: z.number().int(),
  airedEpisodeCount: z.number().int(),
  timestamp: z.string(),
  failedEpisodeLabels: z.array(z.string()),
});

/** A season whose aired episode count lags its announced total. */
export type DiscrepancyRecord = z.infer<typeof discrepancyRecordSchema>;

export const discrepancyFileSchema = z.object({
  discrepancies: z.array(discrepancyRecordSchema),
});

export interface DiscrepancyStore {
  get(showTitle: string, seasonNumber: number): Promise<DiscrepancyRecord | undefined>;
  /** Inserts or replaces the record for (showTitle, seasonNumber). */
  put(record: DiscrepancyRecord): Promise<void>;
  list(): Promise<DiscrepancyRecord[]>;
}
