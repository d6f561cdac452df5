import { parseOrThrow } from '@loadwire/core-validation';
import { z } from 'zod';

import { ALL_SYSTEM_TAGS, DEFAULT_SYSTEM_TAGS, METADATA_TAGS } from './constants.js';
import type { SystemTagName, TagSet } from './types.js';

export function isSystemTagName(value: string): value is SystemTagName {
  return ALL_SYSTEM_TAGS.some((tag) => tag === value);
}

/**
 * The system tags a run has enabled. Disabled tags are never attached to samples.
 */
export class SystemTagSet {
  private readonly enabled: ReadonlySet<SystemTagName>;

  constructor(tags: Iterable<SystemTagName> = DEFAULT_SYSTEM_TAGS) {
    this.enabled = new Set(tags);
  }

  static all(): SystemTagSet {
    return new SystemTagSet(ALL_SYSTEM_TAGS);
  }

  has(tag: SystemTagName): boolean {
    return this.enabled.has(tag);
  }

  with(...tags: SystemTagName[]): SystemTagSet {
    return new SystemTagSet([...this.enabled, ...tags]);
  }

  without(...tags: SystemTagName[]): SystemTagSet {
    return new SystemTagSet([...this.enabled].filter((tag) => !tags.includes(tag)));
  }

  toArray(): SystemTagName[] {
    return ALL_SYSTEM_TAGS.filter((tag) => this.enabled.has(tag));
  }
}

const systemTagListSchema = z.array(
  z.string().refine(isSystemTagName, (value) => ({ message: `unknown system tag "${value}"` }))
);

export function parseSystemTags(names: readonly string[]): SystemTagSet {
  return new SystemTagSet(parseOrThrow(systemTagListSchema, names, 'systemTags'));
}

/**
 * Tags index samples into series; metadata rides along without creating one.
 * Cloned per emission so one request's tags never leak into the next.
 */
export class TagsAndMeta {
  private readonly tags: Map<string, string>;
  private readonly metadata: Map<string, string>;

  constructor(tags: TagSet = {}, metadata: TagSet = {}) {
    this.tags = new Map(Object.entries(tags));
    this.metadata = new Map(Object.entries(metadata));
  }

  clone(): TagsAndMeta {
    return new TagsAndMeta(this.tagSet(), this.metadataSet());
  }

  get(key: string): string | undefined {
    return this.tags.get(key);
  }

  set(key: string, value: string): void {
    this.tags.set(key, value);
  }

  delete(key: string): void {
    this.tags.delete(key);
  }

  getMetadata(key: string): string | undefined {
    return this.metadata.get(key);
  }

  setMetadata(key: string, value: string): void {
    this.metadata.set(key, value);
  }

  /**
   * Attaches `value` only when `tag` is enabled; metadata tags land in the
   * metadata map instead of the tag set.
   */
  setSystemTagOrMetaIfEnabled(enabled: SystemTagSet, tag: SystemTagName, value: string): void {
    if (!enabled.has(tag)) return;
    if (METADATA_TAGS.has(tag)) {
      this.metadata.set(tag, value);
      return;
    }
    this.tags.set(tag, value);
  }

  tagSet(): TagSet {
    return Object.fromEntries(this.tags);
  }

  metadataSet(): TagSet {
    return Object.fromEntries(this.metadata);
  }
}
