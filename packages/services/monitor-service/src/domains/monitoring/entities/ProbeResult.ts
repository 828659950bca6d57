export const PROBE_ERROR_CATEGORIES = [
  'Timeout',
  'ConnectionError',
  'ClientError',
  'StatusMismatch',
  'CircuitOpen',
  'Unexpected',
] as const;

export type ProbeErrorCategory = (typeof PROBE_ERROR_CATEGORIES)[number];

/** Outcome of one health check. Immutable once created. */
export interface ProbeResult {
  readonly success: boolean;
  readonly statusCode: number | null;
  readonly responseTimeMs: number | null;
  readonly errorCategory: ProbeErrorCategory | null;
  readonly errorMessage: string | null;
  readonly checkedAt: Date;
}

export interface StoredProbeResult extends ProbeResult {
  readonly id: string;
  readonly endpointId: string;
}

export function successfulProbe(statusCode: number, responseTimeMs: number, checkedAt = new Date()): ProbeResult {
  return {
    success: true,
    statusCode,
    responseTimeMs,
    errorCategory: null,
    errorMessage: null,
    checkedAt,
  };
}

export function failedProbe(
  category: ProbeErrorCategory,
  message: string,
  details: { statusCode?: number | null; responseTimeMs?: number | null; checkedAt?: Date } = {}
): ProbeResult {
  return {
    success: false,
    statusCode: details.statusCode ?? null,
    responseTimeMs: details.responseTimeMs ?? null,
    errorCategory: category,
    errorMessage: message,
    checkedAt: details.checkedAt ?? new Date(),
  };
}
