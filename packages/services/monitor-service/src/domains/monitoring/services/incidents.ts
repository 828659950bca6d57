import type { ProbeResult } from '../entities/ProbeResult';

export const INCIDENT_GAP_THRESHOLD_SECONDS = 120;

export interface DowntimeIncident {
  start: string;
  end: string;
  durationMinutes: number;
  failureCount: number;
  errors: string[];
}

export interface IncidentGroupingOptions {
  /** Consecutive failures at most this far apart belong to the same incident */
  gapThresholdSeconds?: number;
  minDurationMinutes?: number;
}

interface OpenIncident {
  start: Date;
  end: Date;
  failureCount: number;
  errors: Set<string>;
}

const roundTo = (value: number, decimals: number) => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

function close(incident: OpenIncident): DowntimeIncident & { exactMinutes: number } {
  const exactMinutes = (incident.end.getTime() - incident.start.getTime()) / 60000;
  return {
    start: incident.start.toISOString(),
    end: incident.end.toISOString(),
    durationMinutes: roundTo(exactMinutes, 1),
    failureCount: incident.failureCount,
    errors: [...incident.errors],
    exactMinutes,
  };
}

/**
 * Groups failed results into downtime incidents. Does not mutate `results`.
 */
export function groupIncidents(
  results: readonly ProbeResult[],
  options: IncidentGroupingOptions = {}
): DowntimeIncident[] {
  const gapMs = (options.gapThresholdSeconds ?? INCIDENT_GAP_THRESHOLD_SECONDS) * 1000;
  const minDurationMinutes = options.minDurationMinutes ?? 1;

  const failures = results
    .filter(result => !result.success)
    .sort((a, b) => a.checkedAt.getTime() - b.checkedAt.getTime());

  const grouped: OpenIncident[] = [];
  let current: OpenIncident | null = null;

  for (const failure of failures) {
    if (current && failure.checkedAt.getTime() - current.end.getTime() <= gapMs) {
      current.end = failure.checkedAt;
      current.failureCount++;
    } else {
      current = { start: failure.checkedAt, end: failure.checkedAt, failureCount: 1, errors: new Set() };
      grouped.push(current);
    }
    if (failure.errorMessage) current.errors.add(failure.errorMessage);
  }

  return grouped
    .map(close)
    .filter(incident => incident.exactMinutes >= minDurationMinutes)
    .map(({ exactMinutes: _exact, ...incident }) => incident);
}
