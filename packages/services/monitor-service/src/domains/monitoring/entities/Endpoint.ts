import { z } from 'zod';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Monitored target. Interval and timeout are in seconds. */
export const endpointSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(255),
  url: z.string().url(),
  method: z.enum(HTTP_METHODS).default('GET'),
  interval: z.number().int().min(10).default(60),
  timeout: z.number().int().min(1).default(5),
  expectedStatus: z.number().int().min(100).max(599).default(200),
  headers: z.record(z.string()).default({}),
  body: z.unknown().optional(),
  active: z.boolean().default(true),
});

export type Endpoint = z.output<typeof endpointSchema>;
