import { normalize } from 'node:path';
import pLimit from 'p-limit';
import { commitCandidates, recordSkip, type FixCandidate } from './commit.js';
import { parseFixerOptions, toFixMode, type FixerOptionsInput, type FixerSettings } from './config.js';
import { FileChange, FixResult } from './result.js';
import type { ResolverRegistry } from './resolver.js';
import { FIX_SAFETY_RANK, type SuggestedFix, type Violation } from './types.js';
import { defaultRegistry } from '../resolvers/index.js';

export interface FixerOptions extends FixerOptionsInput {
  registry?: ResolverRegistry;
}

export interface ApplyOptions {
  // Stops new resolver calls; calls already running finish and are committed
  signal?: AbortSignal;
}

export type SourceMap = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

type Resolution = { fix: SuggestedFix } | { error: string };

function sourceEntries(sources: SourceMap): Iterable<[string, string]> {
  return sources instanceof Map ? sources.entries() : Object.entries(sources);
}

function groupByFile(candidates: readonly FixCandidate[]): Map<string, FixCandidate[]> {
  const byFile = new Map<string, FixCandidate[]>();
  for (const c of candidates) {
    const file = normalize(c.violation.location.file);
    const list = byFile.get(file);
    if (list) list.push(c);
    else byFile.set(file, [c]);
  }
  return byFile;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Applies suggested fixes to in-memory sources.
 *
 * Fixes with precomputed edits are committed first. Deferred fixes are then
 * resolved against each file's updated content, one at a time per file, with
 * files handled in parallel up to `concurrency`.
 */
export class Fixer {
  readonly settings: FixerSettings;
  private readonly registry: ResolverRegistry;

  constructor(options: FixerOptions = {}) {
    const { registry, ...rest } = options;
    this.settings = parseFixerOptions(rest);
    this.registry = registry ?? defaultRegistry();
  }

  async apply(violations: readonly Violation[], sources: SourceMap, options: ApplyOptions = {}): Promise<FixResult> {
    const changes = new Map<string, FileChange>();
    for (const [path, content] of sourceEntries(sources)) {
      changes.set(normalize(path), new FileChange(path, content));
    }

    const { immediate, deferred } = this.classify(violations, changes);

    for (const [file, candidates] of groupByFile(immediate)) {
      const fc = changes.get(file);
      if (fc) commitCandidates(fc, candidates);
    }

    if (deferred.length > 0) await this.resolveDeferred(changes, deferred, options.signal);

    return new FixResult(changes);
  }

  private classify(violations: readonly Violation[], changes: Map<string, FileChange>) {
    const immediate: FixCandidate[] = [];
    const deferred: FixCandidate[] = [];

    for (const violation of violations) {
      const fix = violation.suggestedFix;
      if (!fix) continue;
      const fc = changes.get(normalize(violation.location.file));
      if (!fc) continue;

      const candidate: FixCandidate = { violation, fix };
      if (!this.ruleAllowed(violation.ruleCode)) {
        recordSkip(fc, candidate, 'rule-filter');
      } else if (FIX_SAFETY_RANK[fix.safety] > FIX_SAFETY_RANK[this.settings.safetyThreshold]) {
        recordSkip(fc, candidate, 'safety');
      } else if (!this.fixModeAllowed(violation.location.file, violation.ruleCode)) {
        recordSkip(fc, candidate, 'fix-mode');
      } else if (fix.needsResolve) {
        deferred.push(candidate);
      } else if (fix.edits.length === 0) {
        recordSkip(fc, candidate, 'no-edits');
      } else {
        immediate.push(candidate);
      }
    }

    return { immediate, deferred };
  }

  private ruleAllowed(ruleCode: string): boolean {
    const { fixRules } = this.settings;
    return fixRules.length === 0 || fixRules.includes(ruleCode);
  }

  private fixModeAllowed(file: string, ruleCode: string): boolean {
    const mode = toFixMode(this.settings.fixModes[normalize(file)]?.[ruleCode]);
    switch (mode) {
      case 'never':
        return false;
      case 'explicit':
        return this.settings.fixRules.includes(ruleCode);
      case 'unsafe-only':
        return this.settings.safetyThreshold === 'unsafe';
      case 'always':
        return true;
    }
  }

  private async resolveDeferred(changes: Map<string, FileChange>, candidates: readonly FixCandidate[], signal?: AbortSignal) {
    const limit = pLimit(this.settings.concurrency);
    const tasks: Promise<void>[] = [];
    for (const [file, list] of groupByFile(candidates)) {
      const fc = changes.get(file);
      if (fc) tasks.push(limit(() => this.resolveFile(fc, list, signal)));
    }
    await Promise.all(tasks);
  }

  // Sequential within a file so each resolver reads what the previous one wrote.
  private async resolveFile(fc: FileChange, candidates: readonly FixCandidate[], signal?: AbortSignal) {
    for (const candidate of candidates) {
      if (signal?.aborted) {
        recordSkip(fc, candidate, 'resolve-error', 'fix run cancelled');
        continue;
      }
      const outcome = await this.resolve(fc, candidate, signal);
      if ('error' in outcome) {
        recordSkip(fc, candidate, 'resolve-error', outcome.error);
      } else if (outcome.fix.edits.length === 0) {
        recordSkip(fc, candidate, 'no-edits');
      } else {
        commitCandidates(fc, [{ violation: candidate.violation, fix: outcome.fix }]);
      }
    }
  }

  private async resolve(fc: FileChange, candidate: FixCandidate, signal?: AbortSignal): Promise<Resolution> {
    const request = candidate.fix.resolver;
    if (!request) return { error: 'fix needs resolution but names no resolver' };
    const resolver = this.registry.get(request.resolverId);
    if (!resolver) return { error: `no resolver registered for "${request.resolverId}"` };

    try {
      const edits = await resolver.resolve({ filePath: fc.path, content: fc.content, signal }, request.data, candidate.fix);
      return { fix: { ...candidate.fix, edits, needsResolve: false } };
    } catch (err) {
      return { error: errorText(err) };
    }
  }
}
