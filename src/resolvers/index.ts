import { ResolverRegistry } from '../core/resolver.js';
import { EpilogueOrderResolver } from './epilogueOrder.js';
import { HeredocResolver } from './heredoc.js';
import { NewlineResolver } from './newline.js';

export { HeredocResolver, HEREDOC_RESOLVER_ID, HEREDOC_DEFAULT_MIN_COMMANDS } from './heredoc.js';
export { EpilogueOrderResolver, EPILOGUE_ORDER_RESOLVER_ID, EPILOGUE_RANK } from './epilogueOrder.js';
export { NewlineResolver, NEWLINE_RESOLVER_ID } from './newline.js';

/** A fresh registry holding the built-in resolvers. */
export function createDefaultRegistry(): ResolverRegistry {
  return new ResolverRegistry()
    .register(new HeredocResolver())
    .register(new EpilogueOrderResolver())
    .register(new NewlineResolver());
}

let shared: ResolverRegistry | undefined;

/** The process-wide registry, built on first use. */
export function defaultRegistry(): ResolverRegistry {
  shared ??= createDefaultRegistry();
  return shared;
}
