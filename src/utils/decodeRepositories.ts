import { z } from 'zod';
import { NO_LANGUAGE } from '@/config';
import { DecodeError } from '@/services/errors';
import type { ResultRecord } from '@/types/search';

/**
 * Field mapping from the raw `/search/repositories` body to ResultRecord.
 * A single bad item fails the whole batch.
 */

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO-8601 timestamp' });

export const repositoryItemSchema = z.object({
  id: z.number(),
  name: z.string(),
  full_name: z.string().optional(),
  owner: z.object({
    login: z.string(),
    avatar_url: z.string(),
  }),
  html_url: z.string(),
  updated_at: isoTimestamp,
  description: z.string().nullable(),
  language: z.string().nullish(),
  score: z.number().optional(),
  stargazers_count: z.number().optional(),
});

export const searchResponseSchema = z.object({
  total_count: z.number().optional(),
  items: z.array(repositoryItemSchema),
});

export type RawRepositoryItem = z.infer<typeof repositoryItemSchema>;

export function toResultRecord(item: RawRepositoryItem): ResultRecord {
  return {
    id: item.id,
    name: item.name,
    fullName: item.full_name ?? `${item.owner.login}/${item.name}`,
    owner: { name: item.owner.login, avatarUrl: item.owner.avatar_url },
    url: item.html_url,
    lastUpdated: Math.floor(Date.parse(item.updated_at) / 1000),
    description: item.description,
    language: item.language ?? NO_LANGUAGE,
    score: item.score ?? null,
    stars: item.stargazers_count ?? 0,
  };
}

export function decodeSearchResponse(raw: unknown): { totalCount: number; records: ResultRecord[] } {
  const parsed = searchResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new DecodeError(field, issue ? issue.message : 'Invalid response');
  }

  const records = parsed.data.items.map(toResultRecord);
  return {
    totalCount: parsed.data.total_count ?? records.length,
    records,
  };
}
