export { Element, compareElements, MIN_ATOMIC_NUMBER, MAX_ATOMIC_NUMBER } from './element.js';
export { AtomicShell, compareAtomicShells } from './atomicShell.js';
export { AtomicSubshell, allowedTotalAngularMomenta } from './atomicSubshell.js';
export type { SubshellLike, SubshellTriple } from './atomicSubshell.js';
export { Transition } from './transition.js';
export type { QuantumSextuple, SubshellPair, TransitionLike } from './transition.js';
export { TransitionSet } from './transitionSet.js';
export { Notation, NOTATION_IUPAC, NOTATION_SIEGBAHN, NOTATION_ORBITAL } from './notation.js';
export { Language } from './language.js';
export { Reference } from './reference.js';
export type { ReferenceFields } from './reference.js';
export { XrayLine } from './xrayLine.js';
export type { XrayLineInit } from './xrayLine.js';
export {
  isRadiative,
  isCosterKronig,
  electricDipolePermitted,
  electricQuadrupolePermitted,
} from './selectionRules.js';
export {
  atomicShellLabel,
  atomicSubshellLabel,
  transitionLabel,
  subshellIndex,
  listSubshells,
  MAX_LABELLED_N,
} from './notationLabels.js';
export type { NotationRendering, NotationSystem } from './notationLabels.js';
