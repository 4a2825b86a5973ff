import { requireNonEmptyString } from './validate.js';

/** BibTeX fields a reference may carry besides its key. */
export interface ReferenceFields {
  author?: string;
  year?: string;
  title?: string;
  type?: string;
  booktitle?: string;
  editor?: string;
  pages?: string;
  edition?: string;
  journal?: string;
  school?: string;
  address?: string;
  url?: string;
  note?: string;
  number?: string;
  series?: string;
  volume?: string;
  publisher?: string;
  organization?: string;
  chapter?: string;
  howpublished?: string;
  doi?: string;
}

export class Reference {
  readonly bibtexKey: string;
  readonly fields: Readonly<ReferenceFields>;

  constructor(bibtexKey: string, fields: ReferenceFields = {}) {
    this.bibtexKey = requireNonEmptyString('bibtexKey', bibtexKey);
    this.fields = Object.freeze({ ...fields });
    Object.freeze(this);
  }

  get key(): string {
    return this.bibtexKey;
  }

  /** Identity is the BibTeX key alone. */
  equals(other: unknown): boolean {
    return other instanceof Reference && other.bibtexKey === this.bibtexKey;
  }

  toString(): string {
    return `Reference(${this.bibtexKey})`;
  }
}
