import { TAGS, type BuiltinMetrics } from './constants.js';
import { pushIfNotDone, Samples } from './sinks.js';
import type { SystemTagSet, TagsAndMeta } from './tags.js';
import type { SampleSink, TagSet } from './types.js';

export type Check = {
  readonly name: string;
  passes: number;
  fails: number;
};

/**
 * Named checks with their pass/fail tallies. Asking for a name twice returns
 * the same record.
 */
export class CheckRegistry {
  private readonly checks = new Map<string, Check>();

  check(name: string): Check {
    const existing = this.checks.get(name);
    if (existing) return existing;

    const created: Check = { name, passes: 0, fails: 0 };
    this.checks.set(name, created);
    return created;
  }

  get(name: string): Check | undefined {
    return this.checks.get(name);
  }

  list(): Check[] {
    return [...this.checks.values()];
  }
}

export type CheckContext = {
  tagsAndMeta: TagsAndMeta;
  systemTags: SystemTagSet;
  builtinMetrics: BuiltinMetrics;
  sink: SampleSink;
  registry: CheckRegistry;
  signal?: AbortSignal;
  now?: () => Date;
};

/**
 * Records whether `response` carries `wantStatus` as one `checks` sample and
 * returns the outcome.
 */
export function checkStatus(
  context: CheckContext,
  wantStatus: number,
  response: { readonly status: number } | null | undefined,
  extraTags: TagSet = {}
): boolean {
  if (response === null || response === undefined) {
    throw new Error('missing response');
  }

  const time = (context.now ?? (() => new Date()))();
  const tags = context.tagsAndMeta.clone();
  for (const [key, value] of Object.entries(extraTags)) {
    tags.set(key, value);
  }

  const check = context.registry.check(`check status is ${wantStatus}`);
  tags.setSystemTagOrMetaIfEnabled(context.systemTags, TAGS.CHECK, check.name);

  const pass = response.status === wantStatus;
  if (pass) {
    check.passes += 1;
  } else {
    check.fails += 1;
  }

  pushIfNotDone(
    context.signal,
    context.sink,
    new Samples([
      {
        metric: context.builtinMetrics.checks,
        tags: tags.tagSet(),
        metadata: tags.metadataSet(),
        time,
        value: pass ? 1 : 0
      }
    ])
  );

  return pass;
}
