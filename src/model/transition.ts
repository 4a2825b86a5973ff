import { AtomicSubshell, type SubshellLike } from './atomicSubshell.js';
import { isCosterKronig, isRadiative } from './selectionRules.js';

export type QuantumSextuple = readonly [
  srcN: number, srcL: number, srcJN: number,
  dstN: number, dstL: number, dstJN: number,
];

export type SubshellPair = readonly [source: SubshellLike, destination: SubshellLike];

export type TransitionLike = Transition | SubshellPair | QuantumSextuple;

export class Transition {
  readonly source: AtomicSubshell;
  readonly destination: AtomicSubshell;

  constructor(source: SubshellLike, destination: SubshellLike) {
    this.source = AtomicSubshell.from(source);
    this.destination = AtomicSubshell.from(destination);
    Object.freeze(this);
  }

  static fromQuantumNumbers(numbers: QuantumSextuple): Transition {
    const [srcN, srcL, srcJN, dstN, dstL, dstJN] = numbers;
    return new Transition([srcN, srcL, srcJN], [dstN, dstL, dstJN]);
  }

  static from(like: TransitionLike): Transition {
    if (like instanceof Transition) return like;
    if (like.length === 6) return Transition.fromQuantumNumbers(like);
    return new Transition(like[0], like[1]);
  }

  get key(): string {
    return `${this.source.key}->${this.destination.key}`;
  }

  get isRadiative(): boolean {
    return isRadiative(this.source, this.destination);
  }

  get isCosterKronig(): boolean {
    return isCosterKronig(this.source, this.destination);
  }

  toQuantumNumbers(): QuantumSextuple {
    const [srcN, srcL, srcJN] = this.source.toTriple();
    const [dstN, dstL, dstJN] = this.destination.toTriple();
    return [srcN, srcL, srcJN, dstN, dstL, dstJN];
  }

  equals(other: unknown): boolean {
    return other instanceof Transition && other.key === this.key;
  }

  compareTo(other: Transition): number {
    return this.source.compareTo(other.source) || this.destination.compareTo(other.destination);
  }

  toString(): string {
    const src = this.source;
    const dst = this.destination;
    return `Transition([n=${src.n}, l=${src.l}, j=${src.j.toFixed(1)}] -> [n=${dst.n}, l=${dst.l}, j=${dst.j.toFixed(1)}])`;
  }
}
