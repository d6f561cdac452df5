import { describe, expect, it } from 'vitest';

import { ValidationError } from '@loadwire/core-validation';

import { DEFAULT_SYSTEM_TAGS, parseSystemTags, SystemTagSet, TagsAndMeta } from '../src/index.js';

describe('SystemTagSet', () => {
  it('enables everything but ip and the metadata tags by default', () => {
    const tags = new SystemTagSet();

    expect(tags.has('url')).toBe(true);
    expect(tags.has('expected_response')).toBe(true);
    expect(tags.has('ip')).toBe(false);
    expect(tags.has('vu')).toBe(false);
    expect(tags.has('iter')).toBe(false);
    expect(tags.toArray()).toEqual(DEFAULT_SYSTEM_TAGS);
  });

  it('derives new sets without touching the original', () => {
    const base = new SystemTagSet(['url', 'name']);
    const widened = base.with('ip');
    const narrowed = base.without('name');

    expect(widened.toArray()).toEqual(['url', 'name', 'ip']);
    expect(narrowed.toArray()).toEqual(['url']);
    expect(base.toArray()).toEqual(['url', 'name']);
  });
});

describe('parseSystemTags', () => {
  it('accepts known names in canonical order', () => {
    expect(parseSystemTags(['ip', 'url']).toArray()).toEqual(['url', 'ip']);
  });

  it('rejects unknown names with their position', () => {
    expect(() => parseSystemTags(['url', 'bogus'])).toThrow(ValidationError);
    expect(() => parseSystemTags(['url', 'bogus'])).toThrow('systemTags: 1: unknown system tag "bogus"');
  });
});

describe('TagsAndMeta', () => {
  it('only sets enabled system tags', () => {
    const context = new TagsAndMeta();
    const enabled = new SystemTagSet(['status']);

    context.setSystemTagOrMetaIfEnabled(enabled, 'status', '200');
    context.setSystemTagOrMetaIfEnabled(enabled, 'method', 'GET');

    expect(context.tagSet()).toEqual({ status: '200' });
  });

  it('routes metadata tags into metadata', () => {
    const context = new TagsAndMeta({ scenario: 'smoke' });

    context.setSystemTagOrMetaIfEnabled(SystemTagSet.all(), 'vu', '3');

    expect(context.tagSet()).toEqual({ scenario: 'smoke' });
    expect(context.metadataSet()).toEqual({ vu: '3' });
  });

  it('clones independently', () => {
    const original = new TagsAndMeta({ name: 'home' }, { trace: 'a' });
    const copy = original.clone();

    copy.set('name', 'other');
    copy.setMetadata('trace', 'b');

    expect(original.get('name')).toBe('home');
    expect(original.getMetadata('trace')).toBe('a');
    expect(copy.tagSet()).toEqual({ name: 'other' });
  });
});
