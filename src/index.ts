// Public SDK surface for programmatic use
import { Fixer, type ApplyOptions, type FixerOptions, type SourceMap } from './core/fixer.js';
import type { FixResult } from './core/result.js';
import type { Violation } from './core/types.js';

export type {
  Position,
  Location,
  TextEdit,
  Severity,
  FixSafety,
  FixMode,
  SuggestedFix,
  Violation,
  ResolverPayloads,
  ResolverId,
  ResolverRequest,
  HeredocResolveData,
  HeredocFixKind,
  EpilogueOrderResolveData,
  NewlineResolveData,
  NewlineMode,
} from './core/types.js';
export { FIX_SAFETY_RANK } from './core/types.js';

// Orchestration
export { Fixer } from './core/fixer.js';
export type { FixerOptions, ApplyOptions, SourceMap } from './core/fixer.js';
export { FileChange, FixResult, describeSkipReason } from './core/result.js';
export type { AppliedFix, SkippedFix, SkipReason } from './core/result.js';

// Resolvers
export { ResolverRegistry, DuplicateResolverError } from './core/resolver.js';
export type { Resolver, ResolveContext } from './core/resolver.js';
export {
  createDefaultRegistry,
  defaultRegistry,
  HeredocResolver,
  EpilogueOrderResolver,
  NewlineResolver,
  HEREDOC_RESOLVER_ID,
  HEREDOC_DEFAULT_MIN_COMMANDS,
  EPILOGUE_ORDER_RESOLVER_ID,
  EPILOGUE_RANK,
  NEWLINE_RESOLVER_ID,
} from './resolvers/index.js';

// Edits and conflicts
export { applyEdit, applyEdits, detectLineEnding, rangeLocation, lineTextAt, inferIndentFromLine } from './core/edits.js';
export { editsOverlap, compareEdits } from './core/conflict.js';

// Configuration, input and reports
export { parseFixerOptions, fixerOptionsSchema, toFixMode, buildFixModes, fixModesForFiles, DEFAULT_CONCURRENCY } from './core/config.js';
export type { FixerOptionsInput, FixerSettings, RulesConfig } from './core/config.js';
export { parseViolationReport, violationReportSchema, violationSchema } from './core/schema.js';
export { textReport, toJsonResult } from './core/format.js';

// Dockerfile reading used by resolvers
export { parseDockerfile, DockerfileSyntaxError } from './dockerfile/instructions.js';
export type { DockerfileModel, Instruction, Heredoc } from './dockerfile/instructions.js';
export { splitStages, buildDependents } from './dockerfile/stages.js';
export type { Stage } from './dockerfile/stages.js';

/**
 * Apply the suggested fixes of a batch of violations in one call.
 * Same as `new Fixer(options).apply(violations, sources, { signal })`.
 */
export function applyFixes(
  violations: readonly Violation[],
  sources: SourceMap,
  options: FixerOptions & ApplyOptions = {},
): Promise<FixResult> {
  const { signal, ...fixerOptions } = options;
  return new Fixer(fixerOptions).apply(violations, sources, { signal });
}
