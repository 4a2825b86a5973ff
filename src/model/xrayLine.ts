import { requireNonEmptyString } from './validate.js';
import { validationError } from '../shared/index.js';
import { Element } from './element.js';
import type { TransitionLike } from './transition.js';
import { TransitionSet } from './transitionSet.js';

export interface XrayLineInit {
  element: Element | number;
  transitions: TransitionSet | Iterable<TransitionLike>;
  iupac: string;
  siegbahn: string;
  energyEv: number;
}

/** A characteristic line of one element: its transitions, labels and energy. */
export class XrayLine {
  readonly element: Element;
  readonly transitions: TransitionSet;
  readonly iupac: string;
  readonly siegbahn: string;
  readonly energyEv: number;

  constructor(init: XrayLineInit) {
    this.element = init.element instanceof Element ? init.element : new Element(init.element);
    this.transitions = init.transitions instanceof TransitionSet
      ? init.transitions
      : new TransitionSet(init.transitions);
    this.iupac = requireNonEmptyString('iupac', init.iupac);
    this.siegbahn = requireNonEmptyString('siegbahn', init.siegbahn);
    if (!Number.isFinite(init.energyEv) || init.energyEv < 0) {
      throw validationError('energyEv must be a finite, non-negative number', {
        field: 'energyEv',
        expected: 'finite number >= 0',
        actual: init.energyEv,
      });
    }
    this.energyEv = init.energyEv;
    Object.freeze(this);
  }

  get atomicNumber(): number {
    return this.element.atomicNumber;
  }

  get z(): number {
    return this.element.atomicNumber;
  }

  get key(): string {
    return `${this.element.key}:${this.transitions.key}`;
  }

  equals(other: unknown): boolean {
    return other instanceof XrayLine && other.key === this.key;
  }

  /** Lower element and lower energy; neither holds for lines that straddle. */
  isLowerThan(other: XrayLine): boolean {
    return this.element.compareTo(other.element) < 0 && this.energyEv < other.energyEv;
  }

  toString(): string {
    return `XrayLine(${this.iupac})`;
  }
}
