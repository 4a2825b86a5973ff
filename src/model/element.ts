import { requireIntegerInRange } from './validate.js';

export const MIN_ATOMIC_NUMBER = 1;
export const MAX_ATOMIC_NUMBER = 118;

export class Element {
  readonly atomicNumber: number;

  constructor(atomicNumber: number) {
    this.atomicNumber = requireIntegerInRange('atomicNumber', atomicNumber, MIN_ATOMIC_NUMBER, MAX_ATOMIC_NUMBER);
    Object.freeze(this);
  }

  get z(): number {
    return this.atomicNumber;
  }

  get key(): string {
    return String(this.atomicNumber);
  }

  equals(other: unknown): boolean {
    return other instanceof Element && other.atomicNumber === this.atomicNumber;
  }

  compareTo(other: Element): number {
    return this.atomicNumber - other.atomicNumber;
  }

  toString(): string {
    return `Element(z=${this.atomicNumber})`;
  }
}

export function compareElements(a: Element, b: Element): number {
  return a.compareTo(b);
}
