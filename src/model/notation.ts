import { requireNonEmptyString } from './validate.js';

export class Notation {
  readonly name: string;

  constructor(name: string) {
    this.name = requireNonEmptyString('name', name).toLowerCase();
    Object.freeze(this);
  }

  get key(): string {
    return this.name;
  }

  equals(other: unknown): boolean {
    return other instanceof Notation && other.name === this.name;
  }

  toString(): string {
    return `Notation(${this.name})`;
  }
}

export const NOTATION_IUPAC = new Notation('iupac');
export const NOTATION_SIEGBAHN = new Notation('siegbahn');
export const NOTATION_ORBITAL = new Notation('orbital');
