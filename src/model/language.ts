import { validationError } from '../shared/index.js';

export class Language {
  readonly code: string;

  constructor(code: string) {
    if (typeof code !== 'string' || code.length < 2 || code.length > 3) {
      throw validationError('Language code must be between 2 and 3 characters', {
        field: 'code',
        expected: '2 to 3 characters',
        actual: code,
      });
    }
    this.code = code.toLowerCase();
    Object.freeze(this);
  }

  get key(): string {
    return this.code;
  }

  equals(other: unknown): boolean {
    return other instanceof Language && other.code === this.code;
  }

  toString(): string {
    return `Language(${this.code})`;
  }
}
