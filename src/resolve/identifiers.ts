import { z } from 'zod';
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

// Shapes only: ranges are checked by the value objects themselves so that
// an out-of-range number surfaces as a validation error, not as an
// unclassifiable identifier.

const QuantumNumber = z.number().int();

const Label = z.string().min(1);

export const SubshellTripleSchema = z.tuple([QuantumNumber, QuantumNumber, QuantumNumber]);

export const QuantumSextupleSchema = z.tuple([
  QuantumNumber, QuantumNumber, QuantumNumber,
  QuantumNumber, QuantumNumber, QuantumNumber,
]);

export const StructuredSubshellSchema = z.union([z.instanceof(AtomicSubshell), SubshellTripleSchema]);

export const StructuredTransitionSchema = z.union([
  z.instanceof(Transition),
  QuantumSextupleSchema,
  z.tuple([StructuredSubshellSchema, StructuredSubshellSchema]),
]);

export const ElementInputSchema = z.union([z.instanceof(Element), QuantumNumber, Label]);

export const AtomicShellInputSchema = z.union([z.instanceof(AtomicShell), QuantumNumber, Label]);

export const AtomicSubshellInputSchema = z.union([StructuredSubshellSchema, Label]);

export const TransitionInputSchema = z.union([StructuredTransitionSchema, Label]);

export const TransitionSetInputSchema = z.union([
  z.instanceof(TransitionSet),
  z.array(StructuredTransitionSchema),
  Label,
]);

export const NotationInputSchema = z.union([z.instanceof(Notation), z.string()]);

export const LanguageInputSchema = z.union([z.instanceof(Language), z.string()]);

export const ReferenceInputSchema = z.union([z.instanceof(Reference), z.string(), z.null(), z.undefined()]);

export type ElementInput = z.infer<typeof ElementInputSchema>;
export type AtomicShellInput = z.infer<typeof AtomicShellInputSchema>;
export type AtomicSubshellInput = z.infer<typeof AtomicSubshellInputSchema>;
export type TransitionInput = z.infer<typeof TransitionInputSchema>;
export type TransitionSetInput = z.infer<typeof TransitionSetInputSchema>;
export type NotationInput = z.infer<typeof NotationInputSchema>;
export type LanguageInput = z.infer<typeof LanguageInputSchema>;
export type ReferenceInput = z.infer<typeof ReferenceInputSchema>;
