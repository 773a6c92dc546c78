/**
 * Zod schemas for the statistics dump
 *
 * The dump is a JSON object keyed by normalized material key.
 */

import { z } from 'zod';

const wdlSchema = z.union([z.literal(-2), z.literal(-1), z.literal(0), z.literal(1), z.literal(2)]);

const countSchema = z.number().int().nonnegative();

export const tableFileInfoSchema = z.object({
  bytes: countSchema,
  tbcheck: z.string().optional(),
  md5: z.string().optional(),
  sha1: z.string().optional(),
  sha256: z.string().optional(),
  sha512: z.string().optional(),
  b2: z.string().optional(),
  ipfs: z.string().optional(),
});

export const rawLongestEntrySchema = z.object({
  epd: z.string(),
  ply: z.number().int(),
  wdl: wdlSchema,
});

export const rawSideHistogramSchema = z.object({
  win: z.array(countSchema),
  loss: z.array(countSchema),
  wdl: z.record(z.string(), countSchema),
});

export const rawEndgameStatsSchema = z.object({
  rtbw: tableFileInfoSchema.optional(),
  rtbz: tableFileInfoSchema.optional(),
  longest: z.array(rawLongestEntrySchema).default([]),
  histogram: z
    .object({
      white: rawSideHistogramSchema,
      black: rawSideHistogramSchema,
    })
    .optional(),
  total: countSchema.optional(),
});

export const statsDumpSchema = z.record(z.string(), rawEndgameStatsSchema);

export type StatsDump = z.infer<typeof statsDumpSchema>;

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
