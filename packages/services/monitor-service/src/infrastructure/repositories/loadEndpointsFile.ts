import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { MonitorError } from '../../application/errors';
import { endpointSchema, type Endpoint } from '../../domains/monitoring/entities/Endpoint';

const endpointListSchema = z.array(endpointSchema);

/**
 * Reads endpoint definitions from a JSON array file
 */
export async function loadEndpointsFile(path: string): Promise<Endpoint[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw MonitorError.configurationError(
      `cannot read endpoints file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = endpointListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw MonitorError.invalidEndpoint(`${issue.path.join('.')}: ${issue.message}`);
  }

  const ids = new Set<string>();
  for (const endpoint of parsed.data) {
    if (ids.has(endpoint.id)) {
      throw MonitorError.invalidEndpoint(`duplicate id ${endpoint.id}`);
    }
    ids.add(endpoint.id);
  }
  return parsed.data;
}
