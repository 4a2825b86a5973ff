import type { EntityKind } from '../constants.js';
import type { QueryExecutor } from '../db/executor.js';
import type { Reference } from '../model/index.js';
import type { SelectBuilder } from '../query/index.js';
import {
  assertNever,
  resolveAtomicShell,
  resolveAtomicSubshell,
  resolveElement,
  resolveLanguage,
  resolveNotation,
  resolveReference,
  resolveTransition,
  type ResolveTarget,
} from './resolvers.js';
import { resolveTransitionSet } from './transitionSetMatcher.js';

/**
 * Everything a resolution may need besides its input. Passed explicitly per
 * call; nothing here is process-wide.
 */
export interface ResolveContext {
  executor?: QueryExecutor;
  signal?: AbortSignal;
  /** Replaces an unspecified reference. */
  defaultReference?: Reference | string;
}

/**
 * Constrain `target` in `builder` to the entity `input` identifies. The
 * builder is only touched once the input has been classified and validated.
 */
export async function resolve(
  kind: EntityKind,
  input: unknown,
  builder: SelectBuilder,
  target: ResolveTarget,
  context: ResolveContext = {}
): Promise<void> {
  switch (kind) {
    case 'element':
      return resolveElement(builder, target, input);
    case 'atomic_shell':
      return resolveAtomicShell(builder, target, input);
    case 'atomic_subshell':
      return resolveAtomicSubshell(builder, target, input);
    case 'transition':
      return resolveTransition(builder, target, input);
    case 'transitionset':
      return resolveTransitionSet(builder, target, input, {
        executor: context.executor,
        signal: context.signal,
      });
    case 'notation':
      return resolveNotation(builder, target, input);
    case 'language':
      return resolveLanguage(builder, target, input);
    case 'reference':
      return resolveReference(builder, target, input, { defaultReference: context.defaultReference });
    default:
      return assertNever(kind, 'entity kind');
  }
}
