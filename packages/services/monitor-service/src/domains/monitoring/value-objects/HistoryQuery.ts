import { z } from 'zod';
import { MonitorError } from '../../../application/errors';
import type { ProbeHistoryQuery } from '../repositories/IProbeResultRepository';

export const DEFAULT_HISTORY_LIMIT = 100;
export const MAX_HISTORY_LIMIT = 1000;

const withMessage = (message: string) => ({ errorMap: () => ({ message }) });

const isoDate = z
  .string(withMessage('must be an ISO 8601 date'))
  .refine(value => !Number.isNaN(Date.parse(value)), 'must be an ISO 8601 date')
  .transform(value => new Date(value));

const historyQuerySchema = z
  .object({
    limit: z.coerce
      .number(withMessage(`must be an integer between 1 and ${MAX_HISTORY_LIMIT}`))
      .int()
      .min(1)
      .max(MAX_HISTORY_LIMIT)
      .default(DEFAULT_HISTORY_LIMIT),
    offset: z.coerce.number(withMessage('must be a non-negative integer')).int().min(0).default(0),
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine(query => !query.from || !query.to || query.from.getTime() <= query.to.getTime(), {
    message: 'must not be later than to',
    path: ['from'],
  });

/**
 * Parses raw query-string values; absent limit and offset take their defaults
 */
export function parseHistoryQuery(raw: Record<string, unknown>): ProbeHistoryQuery {
  const parsed = historyQuerySchema.safeParse({
    limit: raw.limit,
    offset: raw.offset,
    from: raw.from,
    to: raw.to,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw MonitorError.validationError(issue.path.join('.'), issue.message);
  }
  return parsed.data;
}
