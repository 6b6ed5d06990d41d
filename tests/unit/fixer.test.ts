import { describe, it, expect, vi } from 'vitest';
import { Fixer } from '../../src/core/fixer.js';
import { lineTextAt } from '../../src/core/edits.js';
import { ResolverRegistry, type Resolver } from '../../src/core/resolver.js';
import type { SuggestedFix, Violation } from '../../src/core/types.js';
import { edit, fix, safeFix, violation } from '../helpers.js';

declare module '../../src/core/types.js' {
  interface ResolverPayloads {
    'test-upper': { line: number };
  }
}

const SRC = 'FROM alpine\nRUN apt install curl';

function upperResolver(impl?: Resolver<'test-upper'>['resolve']): Resolver<'test-upper'> {
  return {
    id: 'test-upper',
    resolve: impl ?? ((ctx, data) => {
      const text = lineTextAt(ctx.content, data.line);
      return [edit(ctx.filePath, data.line, 0, data.line, text.length, text.toUpperCase())];
    }),
  };
}

function deferred(line: number, overrides: Partial<SuggestedFix> = {}): SuggestedFix {
  return fix([], { needsResolve: true, resolver: { resolverId: 'test-upper', data: { line } }, ...overrides });
}

describe('Fixer.apply', () => {
  it('applies a single safe fix', async () => {
    const result = await new Fixer().apply(
      [violation('DL3027', safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')]), 'Dockerfile', 2)],
      { Dockerfile: SRC },
    );
    expect(result.get('Dockerfile')?.content).toBe('FROM alpine\nRUN apt-get install curl');
    expect(result.totalApplied()).toBe(1);
    expect(result.totalSkipped()).toBe(0);
    expect(result.filesModified()).toBe(1);
  });

  it('accepts sources as a Map and addresses files by normalized path', async () => {
    const result = await new Fixer().apply(
      [violation('DL3027', safeFix([edit('./Dockerfile', 2, 4, 2, 7, 'apt-get')]), './Dockerfile', 2)],
      new Map([['Dockerfile', SRC]]),
    );
    expect(result.get('./Dockerfile')?.content).toBe('FROM alpine\nRUN apt-get install curl');
  });

  it('keeps one of two overlapping fixes and records a conflict', async () => {
    const src = 'RUN apt-get install curl';
    const result = await new Fixer().apply(
      [
        violation('wide', safeFix([edit('Dockerfile', 1, 4, 1, 15, 'x')])),
        violation('narrow', safeFix([edit('Dockerfile', 1, 4, 1, 7, 'y')])),
      ],
      { Dockerfile: src },
    );
    const fc = result.get('Dockerfile');
    expect(result.totalApplied()).toBe(1);
    expect(fc?.applied.map(a => a.ruleCode)).toEqual(['wide']);
    expect(fc?.skipped).toEqual([
      { ruleCode: 'narrow', reason: 'conflict', location: violation('narrow', undefined).location },
    ]);
  });

  it('lets the lower priority number win an overlap', async () => {
    const result = await new Fixer().apply(
      [
        violation('structural', safeFix([edit('Dockerfile', 1, 0, 1, 8, 'CMD')], 'safe', 100)),
        violation('casing', safeFix([edit('Dockerfile', 1, 0, 1, 3, 'RUN')], 'safe', 0)),
      ],
      { Dockerfile: 'run make' },
    );
    expect(result.get('Dockerfile')?.content).toBe('RUN make');
    expect(result.get('Dockerfile')?.skipped.map(s => [s.ruleCode, s.reason])).toEqual([['structural', 'conflict']]);
  });

  it('rejects every edit of a candidate when one of them conflicts', async () => {
    const result = await new Fixer().apply(
      [
        violation('multi', safeFix([edit('Dockerfile', 1, 0, 1, 3, 'CMD'), edit('Dockerfile', 2, 0, 2, 3, 'XXX')])),
        violation('single', safeFix([edit('Dockerfile', 2, 1, 2, 2, 'y')])),
      ],
      { Dockerfile: 'RUN a\nRUN b' },
    );
    const fc = result.get('Dockerfile');
    expect(fc?.content).toBe('RUN a\nRyN b');
    expect(fc?.applied.map(a => a.ruleCode)).toEqual(['single']);
    expect(fc?.skipped.map(s => [s.ruleCode, s.reason])).toEqual([['multi', 'conflict']]);
  });

  it('composes an indentation insertion with a later rewrite on the same line', async () => {
    const result = await new Fixer().apply(
      [
        violation('rewrite', safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')], 'safe', 10), 'Dockerfile', 2),
        violation('indent', safeFix([edit('Dockerfile', 2, 0, 2, 0, '  ')], 'safe', 0), 'Dockerfile', 2),
      ],
      { Dockerfile: SRC },
    );
    expect(result.get('Dockerfile')?.content).toBe('FROM alpine\n  RUN apt-get install curl');
    expect(result.totalApplied()).toBe(2);
  });

  it('applies same-priority edits on one line right to left', async () => {
    const result = await new Fixer().apply(
      [
        violation('indent', safeFix([edit('Dockerfile', 2, 0, 2, 0, '  ')]), 'Dockerfile', 2),
        violation('rewrite', safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')]), 'Dockerfile', 2),
      ],
      { Dockerfile: SRC },
    );
    expect(result.get('Dockerfile')?.content).toBe('FROM alpine\n  RUN apt-get install curl');
    expect(result.get('Dockerfile')?.applied.map(a => a.ruleCode)).toEqual(['indent', 'rewrite']);
  });

  it('keeps an insertion placed where a same-priority rewrite ends', async () => {
    const result = await new Fixer().apply(
      [
        violation('rewrite', safeFix([edit('Dockerfile', 1, 4, 1, 7, 'apt-get')])),
        violation('flag', safeFix([edit('Dockerfile', 1, 7, 1, 7, ' -y')])),
      ],
      { Dockerfile: 'RUN apt install curl' },
    );
    expect(result.get('Dockerfile')?.content).toBe('RUN apt-get -y install curl');
    expect(result.totalApplied()).toBe(2);
  });

  it('keeps an earlier-priority insertion where a later rewrite ends', async () => {
    const result = await new Fixer().apply(
      [
        violation('rewrite', safeFix([edit('Dockerfile', 1, 4, 1, 7, 'apt-get')], 'safe', 10)),
        violation('flag', safeFix([edit('Dockerfile', 1, 7, 1, 7, ' -y')], 'safe', 0)),
      ],
      { Dockerfile: 'RUN apt install curl' },
    );
    expect(result.get('Dockerfile')?.content).toBe('RUN apt-get -y install curl');
  });

  it('places a later-priority insertion after an earlier rewrite ending at the same column', async () => {
    const result = await new Fixer().apply(
      [
        violation('rewrite', safeFix([edit('Dockerfile', 1, 4, 1, 7, 'apt-get')], 'safe', 0)),
        violation('flag', safeFix([edit('Dockerfile', 1, 7, 1, 7, ' -y')], 'safe', 10)),
      ],
      { Dockerfile: 'RUN apt install curl' },
    );
    expect(result.get('Dockerfile')?.content).toBe('RUN apt-get -y install curl');
  });

  it('records applied fixes with their safety and original edits', async () => {
    const e = edit('Dockerfile', 2, 0, 2, 0, '  ');
    const result = await new Fixer().apply([violation('indent', safeFix([e]), 'Dockerfile', 2)], { Dockerfile: SRC });
    expect(result.get('Dockerfile')?.applied).toEqual([
      {
        ruleCode: 'indent',
        description: 'test fix',
        safety: 'safe',
        location: violation('indent', undefined, 'Dockerfile', 2).location,
        edits: [e],
      },
    ]);
  });

  it('ignores violations without a fix and files outside the sources', async () => {
    const result = await new Fixer().apply(
      [
        violation('no-fix', undefined),
        violation('elsewhere', safeFix([edit('other/Dockerfile', 1, 0, 1, 4, 'x')]), 'other/Dockerfile'),
      ],
      { Dockerfile: SRC },
    );
    expect(result.changes.size).toBe(1);
    expect(result.totalApplied()).toBe(0);
    expect(result.totalSkipped()).toBe(0);
    expect(result.get('Dockerfile')?.hasChanges()).toBe(false);
  });

  it('skips fixes with no edits', async () => {
    const result = await new Fixer().apply([violation('empty', safeFix([]))], { Dockerfile: SRC });
    expect(result.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['no-edits']);
  });

  it('skips edits outside the file as invalid-range and leaves the buffer alone', async () => {
    const result = await new Fixer().apply(
      [
        violation('far', safeFix([edit('Dockerfile', 1, 0, 100, 0, 'x')])),
        violation('backwards', safeFix([edit('Dockerfile', 2, 5, 1, 0, 'x')])),
      ],
      { Dockerfile: SRC },
    );
    const fc = result.get('Dockerfile');
    expect(fc?.content).toBe(SRC);
    expect(fc?.applied).toEqual([]);
    expect(fc?.skipped.map(s => [s.ruleCode, s.reason])).toEqual([['backwards', 'invalid-range'], ['far', 'invalid-range']]);
  });
});

describe('Fixer filtering', () => {
  const apt = () => safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')]);

  it('never applies fixes above the safety threshold', async () => {
    const violations: Violation[] = [
      violation('unsafe', safeFix([edit('Dockerfile', 1, 0, 1, 4, 'from')], 'unsafe')),
      violation('suggestion', safeFix([edit('Dockerfile', 2, 0, 2, 3, 'run')], 'suggestion')),
    ];
    const result = await new Fixer().apply(violations, { Dockerfile: SRC });
    expect(result.totalApplied()).toBe(0);
    expect(result.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['safety', 'safety']);

    const permissive = await new Fixer({ safetyThreshold: 'unsafe' }).apply(violations, { Dockerfile: SRC });
    expect(permissive.get('Dockerfile')?.content).toBe('from alpine\nrun apt install curl');
  });

  it('applies suggestions at the suggestion threshold', async () => {
    const result = await new Fixer({ safetyThreshold: 'suggestion' }).apply(
      [violation('s', safeFix([edit('Dockerfile', 2, 0, 2, 3, 'run')], 'suggestion'))],
      { Dockerfile: SRC },
    );
    expect(result.totalApplied()).toBe(1);
  });

  it('checks the rule allow-list before safety', async () => {
    const result = await new Fixer({ fixRules: ['DL3027'] }).apply(
      [
        violation('DL3027', apt(), 'Dockerfile', 2),
        violation('other', safeFix([edit('Dockerfile', 1, 0, 1, 4, 'from')], 'unsafe')),
      ],
      { Dockerfile: SRC },
    );
    expect(result.totalApplied()).toBe(1);
    expect(result.get('Dockerfile')?.skipped.map(s => [s.ruleCode, s.reason])).toEqual([['other', 'rule-filter']]);
  });

  it('skips a rule whose fix mode is never', async () => {
    const result = await new Fixer({ fixModes: { Dockerfile: { R: 'never' } } }).apply(
      [violation('R', apt(), 'Dockerfile', 2)],
      { Dockerfile: SRC },
    );
    expect(result.totalApplied()).toBe(0);
    expect(result.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['fix-mode']);
  });

  it('matches fix mode files by normalized path', async () => {
    const result = await new Fixer({ fixModes: { './Dockerfile': { R: 'never' } } }).apply(
      [violation('R', apt(), 'Dockerfile', 2)],
      { Dockerfile: SRC },
    );
    expect(result.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['fix-mode']);
  });

  it('applies explicit rules only when they are allow-listed', async () => {
    const fixModes = { Dockerfile: { R: 'explicit' } };
    const withoutList = await new Fixer({ fixModes }).apply([violation('R', apt(), 'Dockerfile', 2)], { Dockerfile: SRC });
    expect(withoutList.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['fix-mode']);

    const withList = await new Fixer({ fixModes, fixRules: ['R'] }).apply([violation('R', apt(), 'Dockerfile', 2)], { Dockerfile: SRC });
    expect(withList.totalApplied()).toBe(1);
  });

  it('applies unsafe-only rules only under the unsafe threshold', async () => {
    const fixModes = { Dockerfile: { R: 'unsafe-only' } };
    const safe = await new Fixer({ fixModes }).apply([violation('R', apt(), 'Dockerfile', 2)], { Dockerfile: SRC });
    expect(safe.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['fix-mode']);

    const unsafe = await new Fixer({ fixModes, safetyThreshold: 'unsafe' }).apply([violation('R', apt(), 'Dockerfile', 2)], { Dockerfile: SRC });
    expect(unsafe.totalApplied()).toBe(1);
  });

  it('treats an unknown fix mode as always', async () => {
    const result = await new Fixer({ fixModes: { Dockerfile: { R: 'sometimes' } } }).apply(
      [violation('R', apt(), 'Dockerfile', 2)],
      { Dockerfile: SRC },
    );
    expect(result.totalApplied()).toBe(1);
  });

  it('rejects invalid options', () => {
    expect(() => new Fixer({ concurrency: 0 })).toThrow();
  });
});

describe('Fixer resolvers', () => {
  it('resolves against the content left by immediate fixes', async () => {
    const resolver = upperResolver();
    const spy = vi.spyOn(resolver, 'resolve');
    const registry = new ResolverRegistry().register(resolver);

    const result = await new Fixer({ registry }).apply(
      [
        violation('upper', deferred(2), 'Dockerfile', 2),
        violation('DL3027', safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')]), 'Dockerfile', 2),
      ],
      { Dockerfile: SRC },
    );

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0].content).toBe('FROM alpine\nRUN apt-get install curl');
    expect(result.get('Dockerfile')?.content).toBe('FROM alpine\nRUN APT-GET INSTALL CURL');
    expect(result.get('Dockerfile')?.applied.map(a => a.ruleCode)).toEqual(['DL3027', 'upper']);
  });

  it('runs deferred fixes of one file in order, each on the previous output', async () => {
    const registry = new ResolverRegistry().register(upperResolver());
    const result = await new Fixer({ registry }).apply(
      [violation('one', deferred(1)), violation('two', deferred(2), 'Dockerfile', 2)],
      { Dockerfile: 'from alpine\nrun make' },
    );
    expect(result.get('Dockerfile')?.content).toBe('FROM ALPINE\nRUN MAKE');
    expect(result.totalApplied()).toBe(2);
  });

  it('does not mutate the caller fix', async () => {
    const registry = new ResolverRegistry().register(upperResolver());
    const pending = deferred(1);
    const result = await new Fixer({ registry }).apply([violation('one', pending)], { Dockerfile: SRC });
    expect(pending.needsResolve).toBe(true);
    expect(pending.edits).toEqual([]);
    expect(result.get('Dockerfile')?.applied[0]?.edits).toEqual([edit('Dockerfile', 1, 0, 1, 11, 'FROM ALPINE')]);
  });

  it('records a resolve error for an unregistered resolver', async () => {
    const result = await new Fixer({ registry: new ResolverRegistry() }).apply([violation('one', deferred(1))], { Dockerfile: SRC });
    expect(result.get('Dockerfile')?.skipped).toEqual([
      {
        ruleCode: 'one',
        reason: 'resolve-error',
        location: violation('one', undefined).location,
        error: 'no resolver registered for "test-upper"',
      },
    ]);
  });

  it('records a resolve error for a fix naming no resolver', async () => {
    const result = await new Fixer({ registry: new ResolverRegistry() }).apply(
      [violation('one', fix([], { needsResolve: true }))],
      { Dockerfile: SRC },
    );
    expect(result.get('Dockerfile')?.skipped[0]?.error).toBe('fix needs resolution but names no resolver');
  });

  it('keeps going when a resolver throws or rejects', async () => {
    const registry = new ResolverRegistry().register(upperResolver((_ctx, data) => {
      if (data.line === 1) throw new Error('boom');
      return Promise.reject(new Error('later boom'));
    }));
    const result = await new Fixer({ registry }).apply(
      [
        violation('one', deferred(1)),
        violation('two', deferred(2), 'Dockerfile', 2),
        violation('plain', safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')]), 'Dockerfile', 2),
      ],
      { Dockerfile: SRC },
    );
    const fc = result.get('Dockerfile');
    expect(fc?.content).toBe('FROM alpine\nRUN apt-get install curl');
    expect(fc?.skipped.map(s => [s.ruleCode, s.reason, s.error])).toEqual([
      ['one', 'resolve-error', 'boom'],
      ['two', 'resolve-error', 'later boom'],
    ]);
  });

  it('records no-edits when the resolver finds nothing to do', async () => {
    const registry = new ResolverRegistry().register(upperResolver(() => []));
    const result = await new Fixer({ registry }).apply([violation('one', deferred(1))], { Dockerfile: SRC });
    expect(result.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['no-edits']);
  });

  it('vets resolved edits like any other fix', async () => {
    const registry = new ResolverRegistry().register(upperResolver(ctx => [edit(ctx.filePath, 9, 0, 9, 1, 'x')]));
    const result = await new Fixer({ registry }).apply([violation('one', deferred(1))], { Dockerfile: SRC });
    expect(result.get('Dockerfile')?.skipped.map(s => s.reason)).toEqual(['invalid-range']);
  });

  it('stops resolving once the run is cancelled', async () => {
    const controller = new AbortController();
    const resolver = upperResolver((ctx, data) => {
      controller.abort();
      const text = lineTextAt(ctx.content, data.line);
      return [edit(ctx.filePath, data.line, 0, data.line, text.length, text.toUpperCase())];
    });
    const spy = vi.spyOn(resolver, 'resolve');
    const registry = new ResolverRegistry().register(resolver);

    const result = await new Fixer({ registry }).apply(
      [violation('one', deferred(1)), violation('two', deferred(2), 'Dockerfile', 2)],
      { Dockerfile: SRC },
      { signal: controller.signal },
    );

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0].signal).toBe(controller.signal);
    const fc = result.get('Dockerfile');
    expect(fc?.content).toBe('FROM ALPINE\nRUN apt install curl');
    expect(fc?.skipped.map(s => [s.ruleCode, s.reason, s.error])).toEqual([['two', 'resolve-error', 'fix run cancelled']]);
  });

  it('still commits immediate fixes when cancelled up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const registry = new ResolverRegistry().register(upperResolver());
    const result = await new Fixer({ registry }).apply(
      [
        violation('one', deferred(1)),
        violation('plain', safeFix([edit('Dockerfile', 2, 4, 2, 7, 'apt-get')]), 'Dockerfile', 2),
      ],
      { Dockerfile: SRC },
      { signal: controller.signal },
    );
    expect(result.get('Dockerfile')?.content).toBe('FROM alpine\nRUN apt-get install curl');
    expect(result.get('Dockerfile')?.skipped.map(s => s.error)).toEqual(['fix run cancelled']);
  });

  it('resolves several files under a concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const registry = new ResolverRegistry().register(upperResolver(async (ctx, data) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(r => setTimeout(r, 5));
      inFlight--;
      const text = lineTextAt(ctx.content, data.line);
      return [edit(ctx.filePath, data.line, 0, data.line, text.length, text.toUpperCase())];
    }));
    const sources = { 'a/Dockerfile': 'from a', 'b/Dockerfile': 'from b', 'c/Dockerfile': 'from c', 'd/Dockerfile': 'from d' };
    const violations = Object.keys(sources).map(file => violation('up', deferred(1), file));

    const result = await new Fixer({ registry, concurrency: 2 }).apply(violations, sources);
    expect(peak).toBe(2);
    expect(inFlight).toBe(0);
    expect(result.modifiedFiles().map(fc => fc.content)).toEqual(['FROM A', 'FROM B', 'FROM C', 'FROM D']);
  });
});
