import { validationError } from '../shared/index.js';
import { AtomicShell } from './atomicShell.js';
import { requireInteger, requireIntegerInRange } from './validate.js';

/** (n, l, 2j); 2j is kept as an integer numerator. */
export type SubshellTriple = readonly [n: number, l: number, jN: number];

export type SubshellLike = AtomicSubshell | SubshellTriple;

/** Allowed doubled total angular momenta for azimuthal number `l`, ascending. */
export function allowedTotalAngularMomenta(l: number): number[] {
  const low = Math.abs(2 * l - 1);
  const high = 2 * l + 1;
  return low === high ? [high] : [low, high];
}

export class AtomicSubshell {
  readonly principalQuantumNumber: number;
  readonly azimuthalQuantumNumber: number;
  readonly totalAngularMomentumNominator: number;

  constructor(n: number | AtomicShell, l: number, jN: number) {
    const shell = n instanceof AtomicShell ? n : new AtomicShell(n);
    const azimuthal = requireIntegerInRange('azimuthalQuantumNumber', l, 0, shell.n - 1);

    const allowed = allowedTotalAngularMomenta(azimuthal);
    const expected = `one of ${allowed.join(', ')} for l=${azimuthal}`;
    const nominator = requireInteger('totalAngularMomentumNominator', jN, expected);
    if (!allowed.includes(nominator)) {
      throw validationError(`totalAngularMomentumNominator (${nominator}) must be ${expected}`, {
        field: 'totalAngularMomentumNominator',
        expected,
        actual: nominator,
      });
    }

    this.principalQuantumNumber = shell.n;
    this.azimuthalQuantumNumber = azimuthal;
    this.totalAngularMomentumNominator = nominator;
    Object.freeze(this);
  }

  static from(like: SubshellLike): AtomicSubshell {
    if (like instanceof AtomicSubshell) return like;
    return new AtomicSubshell(like[0], like[1], like[2]);
  }

  get n(): number {
    return this.principalQuantumNumber;
  }

  get l(): number {
    return this.azimuthalQuantumNumber;
  }

  get jN(): number {
    return this.totalAngularMomentumNominator;
  }

  get j(): number {
    return this.totalAngularMomentumNominator / 2;
  }

  get atomicShell(): AtomicShell {
    return new AtomicShell(this.principalQuantumNumber);
  }

  get key(): string {
    return `${this.n},${this.l},${this.jN}`;
  }

  toTriple(): SubshellTriple {
    return [this.n, this.l, this.jN];
  }

  equals(other: unknown): boolean {
    return other instanceof AtomicSubshell && other.key === this.key;
  }

  compareTo(other: AtomicSubshell): number {
    return this.n - other.n || this.l - other.l || this.jN - other.jN;
  }

  toString(): string {
    return `AtomicSubshell(n=${this.n}, l=${this.l}, j=${this.j.toFixed(1)})`;
  }
}
