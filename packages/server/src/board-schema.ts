/**
 * Validation of board records sent as JSON
 */

import type { BoardRecord } from '@bridge-analyst/types';
import { z } from 'zod';

import { BadRequestError } from './errors/http-errors.js';

export const boardRecordSchema = z.object({
  dealer: z.enum(['N', 'E', 'S', 'W']).default('N'),
  vuln: z.tuple([z.boolean(), z.boolean()]).default([false, false]),
  hands: z.tuple([z.string(), z.string(), z.string(), z.string()]),
  auction: z.array(z.string()).default([]),
  play: z.array(z.string()).default([]),
  event: z.string().optional(),
  site: z.string().optional(),
  date: z.string().optional(),
  board: z.string().optional(),
  north: z.string().optional(),
  east: z.string().optional(),
  south: z.string().optional(),
  west: z.string().optional(),
  contract: z.string().optional(),
  declarer: z.string().optional(),
  result: z.number().optional(),
  auctionStart: z.string().optional(),
  playStart: z.string().optional(),
});

/**
 * Validate a request body as a board record
 * @throws BadRequestError listing the schema issues
 */
export function parseBoardBody(body: unknown): BoardRecord {
  const result = boardRecordSchema.safeParse(body);
  if (!result.success) {
    throw new BadRequestError(
      'Invalid board record',
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}
