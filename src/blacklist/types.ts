import { z } from 'zod';

export const BlacklistReasonSchema = z.enum([
  'Manual',
  'SuspiciousActivity',
  'Abuse',
  'Spam',
  'Malware',
  'Botnet',
  'Scanning',
  'BruteForce',
]);

export type BlacklistReason = z.infer<typeof BlacklistReasonSchema>;

const Timestamp = z.string().datetime({ offset: true });

// Shape accepted from callers: added_at defaults to now, ip_or_cidr is canonicalized on add
export const BlacklistEntryInputSchema = z.object({
  ip_or_cidr: z.string().min(1),
  reason: BlacklistReasonSchema.default('Manual'),
  added_at: Timestamp.optional(),
  expires_at: Timestamp.nullish(),
  notes: z.string().max(500).nullish(),
});

export type BlacklistEntryInput = z.input<typeof BlacklistEntryInputSchema>;

export interface BlacklistEntry {
  ip_or_cidr: string;
  reason: BlacklistReason;
  added_at: string;
  expires_at: string | null;
  notes: string | null;
}

export const BlacklistEntrySchema = z.object({
  ip_or_cidr: z.string().min(1),
  reason: BlacklistReasonSchema,
  added_at: Timestamp,
  expires_at: Timestamp.nullable().default(null),
  notes: z.string().nullable().default(null),
});

// Manual blacklist document: canonical ip_or_cidr -> entry
export const BlacklistEntriesDocumentSchema = z.record(z.string(), BlacklistEntrySchema);

export type BlacklistEntriesDocument = Record<string, BlacklistEntry>;
