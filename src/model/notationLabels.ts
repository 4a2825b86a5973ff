import { invalidParams, validationError } from '../shared/index.js';
import { AtomicShell } from './atomicShell.js';
import { AtomicSubshell, allowedTotalAngularMomenta } from './atomicSubshell.js';
import { Notation } from './notation.js';
import type { Transition } from './transition.js';

export interface NotationRendering {
  ascii: string;
  utf16: string;
  html: string;
  latex: string;
}

export type NotationSystem = 'iupac' | 'siegbahn' | 'orbital';

export const MAX_LABELLED_N = 7;

const SHELL_LETTERS = ['K', 'L', 'M', 'N', 'O', 'P', 'Q'] as const;
const ROMAN_NUMERALS = ['I', 'II', 'III', 'IV', 'V', 'VI', 'VII', 'VIII', 'IX', 'X', 'XI', 'XII', 'XIII'] as const;
const ORBITAL_LETTERS = ['s', 'p', 'd', 'f', 'g', 'h', 'i'] as const;

function plain(text: string): NotationRendering {
  return { ascii: text, utf16: text, html: text, latex: text };
}

function toSystem(notation: Notation | string): NotationSystem {
  const name = notation instanceof Notation ? notation.name : notation.toLowerCase();
  if (name === 'iupac' || name === 'siegbahn' || name === 'orbital') return name;
  throw invalidParams(`Unsupported notation: ${name}`, { notation: name });
}

function shellLetter(n: number): string {
  const letter = SHELL_LETTERS[n - 1];
  if (letter === undefined) {
    throw validationError(`No notation label for n=${n}`, {
      field: 'principalQuantumNumber',
      expected: `in [1, ${MAX_LABELLED_N}]`,
      actual: n,
    });
  }
  return letter;
}

/**
 * 1-based position of a subshell within its shell: l ascending, then 2j
 * ascending (L1 = 2s1/2, L2 = 2p1/2, L3 = 2p3/2).
 */
export function subshellIndex(subshell: AtomicSubshell): number {
  let index = 0;
  for (let l = 0; l < subshell.n; l += 1) {
    for (const jN of allowedTotalAngularMomenta(l)) {
      index += 1;
      if (l === subshell.l && jN === subshell.jN) return index;
    }
  }
  // Unreachable for a constructed subshell
  return index;
}

/** All subshells of shells 1..maxN in label order. */
export function listSubshells(maxN: number = MAX_LABELLED_N): AtomicSubshell[] {
  const out: AtomicSubshell[] = [];
  for (let n = 1; n <= maxN; n += 1) {
    for (let l = 0; l < n; l += 1) {
      for (const jN of allowedTotalAngularMomenta(l)) {
        out.push(new AtomicSubshell(n, l, jN));
      }
    }
  }
  return out;
}

export function atomicShellLabel(shell: AtomicShell, notation: Notation | string = 'iupac'): NotationRendering {
  const system = toSystem(notation);
  const letter = shellLetter(shell.n);
  return plain(system === 'orbital' ? String(shell.n) : letter);
}

export function atomicSubshellLabel(subshell: AtomicSubshell, notation: Notation | string = 'iupac'): NotationRendering {
  const system = toSystem(notation);
  const letter = shellLetter(subshell.n);
  const index = subshellIndex(subshell);

  switch (system) {
    case 'siegbahn': {
      // No KI
      if (subshell.n === 1) return plain(letter);
      return plain(`${letter}${ROMAN_NUMERALS[index - 1] ?? String(index)}`);
    }
    case 'iupac': {
      if (subshell.n === 1) return plain(letter);
      return {
        ascii: `${letter}${index}`,
        utf16: `${letter}${index}`,
        html: `${letter}<sub>${index}</sub>`,
        latex: `${letter}$_{${index}}$`,
      };
    }
    case 'orbital': {
      const l = ORBITAL_LETTERS[subshell.l] ?? String(subshell.l);
      const text = `${subshell.n}${l}${subshell.jN}/2`;
      return {
        ascii: text,
        utf16: text,
        html: `${subshell.n}${l}<sub>${subshell.jN}/2</sub>`,
        latex: `${subshell.n}${l}$_{${subshell.jN}/2}$`,
      };
    }
  }
}

/** IUPAC transition label, destination first: `K-L3`. */
export function transitionLabel(transition: Transition, notation: Notation | string = 'iupac'): NotationRendering {
  const system = toSystem(notation);
  if (system !== 'iupac') {
    throw invalidParams(`Transitions have no ${system} label`, { notation: system });
  }
  const src = atomicSubshellLabel(transition.source, 'iupac');
  const dst = atomicSubshellLabel(transition.destination, 'iupac');
  return {
    ascii: `${dst.ascii}-${src.ascii}`,
    utf16: `${dst.utf16}–${src.utf16}`,
    html: `${dst.html}&ndash;${src.html}`,
    latex: `${dst.latex}--${src.latex}`,
  };
}
