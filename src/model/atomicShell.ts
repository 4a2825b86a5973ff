import { requireIntegerInRange } from './validate.js';

export class AtomicShell {
  readonly principalQuantumNumber: number;

  constructor(principalQuantumNumber: number) {
    this.principalQuantumNumber = requireIntegerInRange('principalQuantumNumber', principalQuantumNumber, 1);
    Object.freeze(this);
  }

  get n(): number {
    return this.principalQuantumNumber;
  }

  get key(): string {
    return String(this.principalQuantumNumber);
  }

  equals(other: unknown): boolean {
    return other instanceof AtomicShell && other.principalQuantumNumber === this.principalQuantumNumber;
  }

  compareTo(other: AtomicShell): number {
    return this.principalQuantumNumber - other.principalQuantumNumber;
  }

  toString(): string {
    return `AtomicShell(n=${this.principalQuantumNumber})`;
  }
}

export function compareAtomicShells(a: AtomicShell, b: AtomicShell): number {
  return a.compareTo(b);
}
