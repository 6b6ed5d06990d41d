// Positions: 1-based line, 0-based column. Ranges are end-exclusive.
export interface Position { line: number; column: number }

export interface Location {
  file: string;
  start: Position;
  end: Position;
}

export interface TextEdit {
  location: Location;
  // Empty string deletes the range
  newText: string;
}

export type Severity = 'error' | 'warning' | 'info' | 'style';

export type FixSafety = 'safe' | 'suggestion' | 'unsafe';

export const FIX_SAFETY_RANK: Record<FixSafety, number> = {
  safe: 0,
  suggestion: 1,
  unsafe: 2,
};

export type FixMode = 'always' | 'never' | 'explicit' | 'unsafe-only';

export type HeredocFixKind = 'consecutive' | 'chained';

export interface HeredocResolveData {
  kind: HeredocFixKind;
  stageIndex: number;
  minCommands?: number;
}

// Epilogue ordering re-reads the whole file; it carries no payload of its own.
export type EpilogueOrderResolveData = Record<string, never>;

export type NewlineMode = 'always' | 'never' | 'grouped';

export interface NewlineResolveData {
  mode: NewlineMode;
}

/**
 * Payload type for every resolver id. Plugins add their own entries by
 * declaration merging into this interface.
 */
export interface ResolverPayloads {
  'prefer-run-heredoc': HeredocResolveData;
  'epilogue-order': EpilogueOrderResolveData;
  'newline-between-instructions': NewlineResolveData;
}

export type ResolverId = keyof ResolverPayloads;

export type ResolverRequest = {
  [K in ResolverId]: { resolverId: K; data: ResolverPayloads[K] };
}[ResolverId];

export interface SuggestedFix {
  description: string;
  safety: FixSafety;
  // Lower runs first: content fixes (0) before structural rewrites (100+)
  priority: number;
  isPreferred?: boolean;
  // Empty until resolved when needsResolve is set
  edits: readonly TextEdit[];
  needsResolve?: boolean;
  resolver?: ResolverRequest;
}

export interface Violation {
  location: Location;
  ruleCode: string;
  message: string;
  severity: Severity;
  detail?: string;
  docUrl?: string;
  suggestedFix?: SuggestedFix;
}
