import type { z } from 'zod';
import type { EntityKind } from '../constants.js';
import {
  AtomicShell,
  AtomicSubshell,
  Element,
  Language,
  Notation,
  Reference,
  Transition,
  TransitionSet,
} from '../model/index.js';
import { unresolvedIdentifier } from '../shared/index.js';
import {
  AtomicShellInputSchema,
  AtomicSubshellInputSchema,
  ElementInputSchema,
  LanguageInputSchema,
  NotationInputSchema,
  ReferenceInputSchema,
  TransitionInputSchema,
  TransitionSetInputSchema,
} from './identifiers.js';

/** A structured identifier, or a label to be looked up in a notation table. */
export type Normalized<T> =
  | { readonly form: 'value'; readonly value: T }
  | { readonly form: 'notation'; readonly label: string };

export type NormalizedReference =
  | { readonly form: 'value'; readonly value: Reference }
  | { readonly form: 'unspecified' };

function classify<T>(kind: EntityKind, schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw unresolvedIdentifier(kind, input);
  }
  return result.data;
}

function value<T>(v: T): Normalized<T> {
  return { form: 'value', value: v };
}

function notation<T>(label: string): Normalized<T> {
  return { form: 'notation', label };
}

export function normalizeElement(input: unknown): Normalized<Element> {
  const shape = classify('element', ElementInputSchema, input);
  if (typeof shape === 'string') return notation(shape);
  return value(shape instanceof Element ? shape : new Element(shape));
}

export function normalizeAtomicShell(input: unknown): Normalized<AtomicShell> {
  const shape = classify('atomic_shell', AtomicShellInputSchema, input);
  if (typeof shape === 'string') return notation(shape);
  return value(shape instanceof AtomicShell ? shape : new AtomicShell(shape));
}

export function normalizeAtomicSubshell(input: unknown): Normalized<AtomicSubshell> {
  const shape = classify('atomic_subshell', AtomicSubshellInputSchema, input);
  if (typeof shape === 'string') return notation(shape);
  return value(AtomicSubshell.from(shape));
}

export function normalizeTransition(input: unknown): Normalized<Transition> {
  const shape = classify('transition', TransitionInputSchema, input);
  if (typeof shape === 'string') return notation(shape);
  return value(Transition.from(shape));
}

/** Members are coerced before deduplication; an empty sequence fails validation. */
export function normalizeTransitionSet(input: unknown): Normalized<TransitionSet> {
  const shape = classify('transitionset', TransitionSetInputSchema, input);
  if (typeof shape === 'string') return notation(shape);
  return value(shape instanceof TransitionSet ? shape : new TransitionSet(shape));
}

export function normalizeNotation(input: unknown): Notation {
  const shape = classify('notation', NotationInputSchema, input);
  return shape instanceof Notation ? shape : new Notation(shape);
}

export function normalizeLanguage(input: unknown): Language {
  const shape = classify('language', LanguageInputSchema, input);
  return shape instanceof Language ? shape : new Language(shape);
}

export function normalizeReference(input: unknown): NormalizedReference {
  const shape = classify('reference', ReferenceInputSchema, input);
  if (shape === null || shape === undefined || shape === '') return { form: 'unspecified' };
  return { form: 'value', value: shape instanceof Reference ? shape : new Reference(shape) };
}
