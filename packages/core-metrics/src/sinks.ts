import type { Logger } from '@loadwire/core-logging';

import type { Sample, SampleContainer, SampleSink } from './types.js';

export class Samples implements SampleContainer {
  private readonly samples: readonly Sample[];

  constructor(samples: readonly Sample[]) {
    this.samples = samples;
  }

  getSamples(): readonly Sample[] {
    return this.samples;
  }
}

/**
 * Pushes unless the surrounding run has been cancelled; a finished run drops
 * late samples rather than blocking on them.
 */
export function pushIfNotDone(signal: AbortSignal | undefined, sink: SampleSink, container: SampleContainer): boolean {
  if (signal?.aborted) return false;
  sink.push(container);
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// SINKS
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Keeps every pushed sample in memory. Pushes after `close()` are dropped.
 */
export class BufferedSampleSink implements SampleSink {
  private readonly containers: SampleContainer[] = [];
  private closed = false;

  push(container: SampleContainer): void {
    if (this.closed) return;
    this.containers.push(container);
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  batches(): readonly SampleContainer[] {
    return this.containers;
  }

  samples(): Sample[] {
    return this.containers.flatMap((container) => container.getSamples());
  }

  /** Returns and forgets everything buffered so far. */
  drain(): Sample[] {
    const drained = this.samples();
    this.containers.length = 0;
    return drained;
  }
}

/**
 * Writes each sample as a `metric` log entry, the same shape counters and
 * histograms use elsewhere: metric name, type, value, then the tags as labels.
 */
export class LoggerSampleSink implements SampleSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  push(container: SampleContainer): void {
    for (const sample of container.getSamples()) {
      this.logger.info('metric', {
        metric: sample.metric.name,
        metricType: sample.metric.type,
        value: sample.value,
        time: sample.time.toISOString(),
        ...sample.tags,
        ...(Object.keys(sample.metadata).length > 0 ? { metadata: sample.metadata } : {})
      });
    }
  }
}
