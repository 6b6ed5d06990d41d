import type { ResolverId, ResolverPayloads, SuggestedFix, TextEdit } from './types.js';

export interface ResolveContext {
  filePath: string;
  // The file as it stands after every fix committed so far in this run
  content: string;
  signal?: AbortSignal;
}

/**
 * Computes a deferred fix's edits from the current file content.
 *
 * Resolvers must locate their target by reading `content`, never from the
 * violation's original location: earlier fixes in the same run may have moved
 * or merged it. Content already in the target shape yields no edits.
 */
export interface Resolver<K extends ResolverId = ResolverId> {
  readonly id: K;
  resolve(ctx: ResolveContext, data: ResolverPayloads[K], fix: SuggestedFix): Promise<TextEdit[]> | TextEdit[];
}

export class DuplicateResolverError extends Error {
  constructor(readonly resolverId: string) {
    super(`duplicate resolver registration: ${resolverId}`);
    this.name = 'DuplicateResolverError';
  }
}

export class ResolverRegistry {
  private readonly resolvers = new Map<string, Resolver>();

  constructor(initial: Iterable<Resolver> = []) {
    for (const r of initial) this.register(r);
  }

  register<K extends ResolverId>(resolver: Resolver<K>): this {
    if (this.resolvers.has(resolver.id)) throw new DuplicateResolverError(resolver.id);
    this.resolvers.set(resolver.id, resolver);
    return this;
  }

  get(id: string): Resolver | undefined {
    return this.resolvers.get(id);
  }

  has(id: string): boolean {
    return this.resolvers.has(id);
  }

  ids(): string[] {
    return [...this.resolvers.keys()].sort();
  }
}
