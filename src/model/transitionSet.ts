import { validationError } from '../shared/index.js';
import { Transition, type TransitionLike } from './transition.js';

export class TransitionSet implements Iterable<Transition> {
  /** Distinct members in canonical order. */
  readonly transitions: readonly Transition[];

  constructor(transitions: Iterable<TransitionLike>) {
    const byKey = new Map<string, Transition>();
    for (const like of transitions) {
      const transition = Transition.from(like);
      byKey.set(transition.key, transition);
    }

    if (byKey.size === 0) {
      throw validationError('A transition set needs at least one transition', {
        field: 'transitions',
        expected: 'at least one transition',
        actual: 0,
      });
    }

    this.transitions = Object.freeze([...byKey.values()].sort((a, b) => a.compareTo(b)));
    Object.freeze(this);
  }

  get size(): number {
    return this.transitions.length;
  }

  get key(): string {
    return this.transitions.map(t => t.key).join('|');
  }

  has(like: TransitionLike): boolean {
    const key = Transition.from(like).key;
    return this.transitions.some(t => t.key === key);
  }

  equals(other: unknown): boolean {
    return other instanceof TransitionSet && other.key === this.key;
  }

  [Symbol.iterator](): Iterator<Transition> {
    return this.transitions[Symbol.iterator]();
  }

  toString(): string {
    return `TransitionSet(${this.size} possible transitions)`;
  }
}
