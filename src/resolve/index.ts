export { resolve } from './resolve.js';
export type { ResolveContext } from './resolve.js';
export {
  resolveElement,
  resolveAtomicShell,
  resolveAtomicSubshell,
  resolveTransition,
  resolveNotation,
  resolveLanguage,
  resolveReference,
} from './resolvers.js';
export type { ResolveTarget, ReferenceResolveOptions } from './resolvers.js';
export { buildTransitionSetMatch, buildCandidateQuery, resolveTransitionSet } from './transitionSetMatcher.js';
export type { MatchOptions, TransitionSetResolveOptions } from './transitionSetMatcher.js';
export {
  normalizeElement,
  normalizeAtomicShell,
  normalizeAtomicSubshell,
  normalizeTransition,
  normalizeTransitionSet,
  normalizeNotation,
  normalizeLanguage,
  normalizeReference,
} from './normalize.js';
export type { Normalized, NormalizedReference } from './normalize.js';
export type {
  ElementInput,
  AtomicShellInput,
  AtomicSubshellInput,
  TransitionInput,
  TransitionSetInput,
  NotationInput,
  LanguageInput,
  ReferenceInput,
} from './identifiers.js';
