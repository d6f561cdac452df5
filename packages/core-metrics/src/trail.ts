import type { BuiltinMetrics } from './constants.js';
import type { TagsAndMeta } from './tags.js';
import type { RemoteAddress, Sample, SampleContainer, TagSet } from './types.js';

export type TrailInit = {
  endTime: Date;
  /** Time spent establishing the connection, ms. Zero on a reused socket. */
  connDuration: number;
  /** Total round trip time so far, ms. */
  duration: number;
  remoteAddress?: RemoteAddress;
};

/**
 * Timing and connection facts of one round trip. Samples are materialized
 * once, by the dispatcher, when the request is finally emitted.
 */
export class Trail implements SampleContainer {
  endTime: Date;
  connDuration: number;
  duration: number;
  readonly remoteAddress?: RemoteAddress;

  /** Unset until a response callback has judged the status. */
  failed: boolean | undefined = undefined;

  tags: TagSet = {};
  metadata: TagSet = {};
  samples: Sample[] = [];

  private saved = false;

  constructor(init: TrailInit) {
    this.endTime = init.endTime;
    this.connDuration = init.connDuration;
    this.duration = init.duration;
    this.remoteAddress = init.remoteAddress;
  }

  get isSaved(): boolean {
    return this.saved;
  }

  /**
   * Extends the timing after the body has been consumed. No effect once the
   * samples exist.
   */
  complete(endTime: Date, duration: number): void {
    if (this.saved) return;
    this.endTime = endTime;
    this.duration = duration;
  }

  /**
   * Appends the request-count and duration samples. Returns false, appending
   * nothing, when the samples were already saved.
   */
  saveSamples(metrics: BuiltinMetrics, context: TagsAndMeta): boolean {
    if (this.saved) return false;
    this.saved = true;

    this.tags = context.tagSet();
    this.metadata = context.metadataSet();

    const base = { tags: this.tags, metadata: this.metadata, time: this.endTime };
    this.samples.push(
      { ...base, metric: metrics.httpReqs, value: 1 },
      { ...base, metric: metrics.httpReqDuration, value: this.duration }
    );
    return true;
  }

  getSamples(): readonly Sample[] {
    return this.samples;
  }
}
