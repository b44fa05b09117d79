// Path: src/lib/metrics.ts
// Prometheus metrics for cid-rotor

import { metricsLogger as log } from './logger.js';

/**
 * In-process metric registry rendered in Prometheus text format (0.0.4).
 * Families keep registration order; series keep first-seen order.
 */

type Labels = Record<string, string>;

interface Sample {
  labels: Labels;
  value: number;
}

interface HistogramSample {
  labels: Labels;
  /** Cumulative count per bucket boundary, same order as the family's buckets */
  bucketCounts: number[];
  sum: number;
  count: number;
}

type MetricFamily =
  | { type: 'counter'; help: string; samples: Sample[] }
  | { type: 'gauge'; help: string; samples: Sample[] }
  | { type: 'histogram'; help: string; buckets: number[]; samples: HistogramSample[] };

const families = new Map<string, MetricFamily>();

// Rotation attempts are in-process calls, so the buckets sit low (seconds)
const DEFAULT_BUCKETS = [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 1];

function sameLabels(a: Labels, b: Labels): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
}

function findSample<T extends { labels: Labels }>(samples: T[], labels: Labels): T | undefined {
  return samples.find((sample) => sameLabels(sample.labels, labels));
}

function register(name: string, family: MetricFamily): void {
  const existing = families.get(name);
  if (existing && existing.type !== family.type) {
    log.warn({ name, registered: existing.type, requested: family.type }, 'Metric already registered with another type');
    return;
  }
  if (!existing) {
    families.set(name, family);
  }
}

export function registerCounter(name: string, help: string): void {
  register(name, { type: 'counter', help, samples: [] });
}

export function registerGauge(name: string, help: string): void {
  register(name, { type: 'gauge', help, samples: [] });
}

export function registerHistogram(name: string, help: string, buckets: number[] = DEFAULT_BUCKETS): void {
  register(name, { type: 'histogram', help, buckets: [...buckets].sort((a, b) => a - b), samples: [] });
}

export function incCounter(name: string, labels: Labels = {}, value = 1): void {
  const family = families.get(name);
  if (family?.type !== 'counter') {
    log.warn({ name }, 'Counter not registered');
    return;
  }

  const sample = findSample(family.samples, labels);
  if (sample) {
    sample.value += value;
  } else {
    family.samples.push({ labels: { ...labels }, value });
  }
}

export function setGauge(name: string, value: number, labels: Labels = {}): void {
  const family = families.get(name);
  if (family?.type !== 'gauge') {
    log.warn({ name }, 'Gauge not registered');
    return;
  }

  const sample = findSample(family.samples, labels);
  if (sample) {
    sample.value = value;
  } else {
    family.samples.push({ labels: { ...labels }, value });
  }
}

export function observeHistogram(name: string, value: number, labels: Labels = {}): void {
  const family = families.get(name);
  if (family?.type !== 'histogram') {
    log.warn({ name }, 'Histogram not registered');
    return;
  }

  let sample = findSample(family.samples, labels);
  if (!sample) {
    sample = { labels: { ...labels }, bucketCounts: family.buckets.map(() => 0), sum: 0, count: 0 };
    family.samples.push(sample);
  }

  for (let index = 0; index < family.buckets.length; index++) {
    if (value <= family.buckets[index]) {
      sample.bucketCounts[index]++;
    }
  }
  sample.sum += value;
  sample.count++;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function formatLabels(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';
  return `{${entries.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`).join(',')}}`;
}

function renderFamily(name: string, family: MetricFamily): string[] {
  const lines = [`# HELP ${name} ${family.help}`, `# TYPE ${name} ${family.type}`];

  if (family.type === 'histogram') {
    for (const sample of family.samples) {
      family.buckets.forEach((le, index) => {
        lines.push(`${name}_bucket${formatLabels({ ...sample.labels, le: String(le) })} ${sample.bucketCounts[index]}`);
      });
      lines.push(`${name}_bucket${formatLabels({ ...sample.labels, le: '+Inf' })} ${sample.count}`);
      lines.push(`${name}_sum${formatLabels(sample.labels)} ${sample.sum}`);
      lines.push(`${name}_count${formatLabels(sample.labels)} ${sample.count}`);
    }
    return lines;
  }

  for (const sample of family.samples) {
    lines.push(`${name}${formatLabels(sample.labels)} ${sample.value}`);
  }
  // Unlabelled families report zero until first touched
  if (family.samples.length === 0) {
    lines.push(`${name} 0`);
  }
  return lines;
}

/**
 * Export all metrics in Prometheus text format
 */
export function exportMetrics(): string {
  const lines: string[] = [
    '# HELP process_uptime_seconds Process uptime in seconds',
    '# TYPE process_uptime_seconds gauge',
    `process_uptime_seconds ${process.uptime().toFixed(3)}`,
    '',
  ];

  for (const [name, family] of families) {
    lines.push(...renderFamily(name, family), '');
  }

  return lines.join('\n');
}

/**
 * Drop every recorded sample; registrations survive.
 */
export function resetMetrics(): void {
  for (const family of families.values()) {
    family.samples.length = 0;
  }
}

export function initializeMetrics(): void {
  registerCounter('cid_rotor_rotations_total', 'Connection-ID rotation attempts');
  registerCounter('cid_rotor_rotations_suppressed_total', 'Timer rotations deferred by the minimum gap');
  registerCounter('cid_rotor_event_log_failures_total', 'Rotation events that could not be appended');

  registerGauge('cid_rotor_active_connections', 'Live connections in the registry');
  registerGauge('cid_rotor_last_rotation_timestamp_seconds', 'Wall-clock time of the last successful rotation');

  registerHistogram('cid_rotor_rotation_attempt_duration_seconds', 'Time spent in one rotation attempt');

  log.debug({ families: families.size }, 'Metrics initialized');
}

export const metrics = {
  rotationAttempt: (
    outcome: 'ok' | 'failed',
    labels: { role: string; reason: string; strategy: string | null },
    durationMs: number
  ): void => {
    incCounter('cid_rotor_rotations_total', {
      outcome,
      role: labels.role,
      reason: labels.reason,
      strategy: labels.strategy ?? 'none',
    });
    observeHistogram('cid_rotor_rotation_attempt_duration_seconds', durationMs / 1000, { role: labels.role });
    if (outcome === 'ok') {
      setGauge('cid_rotor_last_rotation_timestamp_seconds', Date.now() / 1000, { role: labels.role });
    }
  },
  rotationSuppressed: (role: string): void => {
    incCounter('cid_rotor_rotations_suppressed_total', { role });
  },
  eventLogFailure: (): void => {
    incCounter('cid_rotor_event_log_failures_total');
  },
  setActiveConnections: (count: number): void => {
    setGauge('cid_rotor_active_connections', count);
  },
};
