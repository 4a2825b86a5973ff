import { ALIAS, COLUMN, TABLE } from '../constants.js';
import type { AtomicSubshell, Reference } from '../model/index.js';
import type { SelectBuilder } from '../query/index.js';
import { describeValue, notFound } from '../shared/index.js';
import {
  normalizeAtomicShell,
  normalizeAtomicSubshell,
  normalizeElement,
  normalizeLanguage,
  normalizeNotation,
  normalizeReference,
  normalizeTransition,
} from './normalize.js';

/** The foreign-key column a resolver constrains: `table.column`. */
export interface ResolveTarget {
  table: string;
  column: string;
}

export function assertNever(value: never, kind: string): never {
  throw notFound(`Cannot resolve ${kind}: ${describeValue(value)}`, { kind, value });
}

/** OR-match a label against the ASCII and wide renderings of a notation table. */
function whereNotationLabel(builder: SelectBuilder, table: string, label: string): void {
  builder.addWhere(table, COLUMN.ASCII, '=', label, [table, COLUMN.UTF16, '=', label]);
}

export function resolveElement(builder: SelectBuilder, target: ResolveTarget, input: unknown): void {
  const id = normalizeElement(input);
  switch (id.form) {
    case 'notation':
      builder.addJoin(TABLE.ELEMENT_NAME, COLUMN.ELEMENT_ID, target.table, target.column);
      builder.addJoin(TABLE.ELEMENT_SYMBOL, COLUMN.ELEMENT_ID, target.table, target.column);
      builder.addWhere(TABLE.ELEMENT_NAME, COLUMN.NAME, '=', id.label,
        [TABLE.ELEMENT_SYMBOL, COLUMN.SYMBOL, '=', id.label]);
      return;
    case 'value':
      builder.addJoin(TABLE.ELEMENT, COLUMN.ID, target.table, target.column);
      builder.addWhere(TABLE.ELEMENT, COLUMN.ATOMIC_NUMBER, '=', id.value.atomicNumber);
      return;
    default:
      assertNever(id, 'element');
  }
}

export function resolveAtomicShell(builder: SelectBuilder, target: ResolveTarget, input: unknown): void {
  const id = normalizeAtomicShell(input);
  switch (id.form) {
    case 'notation':
      builder.addJoin(TABLE.ATOMIC_SHELL_NOTATION, COLUMN.ATOMIC_SHELL_ID, target.table, target.column);
      whereNotationLabel(builder, TABLE.ATOMIC_SHELL_NOTATION, id.label);
      return;
    case 'value':
      builder.addJoin(TABLE.ATOMIC_SHELL, COLUMN.ID, target.table, target.column);
      builder.addWhere(TABLE.ATOMIC_SHELL, COLUMN.PRINCIPAL_QUANTUM_NUMBER, '=', id.value.n);
      return;
    default:
      assertNever(id, 'atomic shell');
  }
}

/**
 * Filter `subshellAlias`/`shellAlias` on (n, l, 2j).
 *
 * A subshell that is neither a label nor a positive (n, l >= 0, 2j) triple
 * resolves to nothing. Normalization already rejects such triples with a
 * validation error before this point, so the check below only fires for a
 * subshell built outside the constructor's invariants.
 */
function whereSubshell(
  builder: SelectBuilder,
  subshellAlias: string,
  shellAlias: string,
  subshell: AtomicSubshell,
  kind: string,
  input: unknown
): void {
  const [n, l, jN] = subshell.toTriple();
  if (!(n > 0 && l >= 0 && jN > 0)) {
    throw notFound(`Cannot resolve ${kind}: ${describeValue(input)}`, { kind, value: input });
  }
  builder.addWhere(shellAlias, COLUMN.PRINCIPAL_QUANTUM_NUMBER, '=', n);
  builder.addWhere(subshellAlias, COLUMN.AZIMUTHAL_QUANTUM_NUMBER, '=', l);
  builder.addWhere(subshellAlias, COLUMN.TOTAL_ANGULAR_MOMENTUM_NOMINATOR, '=', jN);
}

export function resolveAtomicSubshell(builder: SelectBuilder, target: ResolveTarget, input: unknown): void {
  const id = normalizeAtomicSubshell(input);
  switch (id.form) {
    case 'notation':
      builder.addJoin(TABLE.ATOMIC_SUBSHELL_NOTATION, COLUMN.ATOMIC_SUBSHELL_ID, target.table, target.column);
      whereNotationLabel(builder, TABLE.ATOMIC_SUBSHELL_NOTATION, id.label);
      return;
    case 'value':
      builder.addJoin(TABLE.ATOMIC_SUBSHELL, COLUMN.ID, target.table, target.column);
      builder.addJoin(TABLE.ATOMIC_SHELL, COLUMN.ID, TABLE.ATOMIC_SUBSHELL, COLUMN.ATOMIC_SHELL_ID);
      whereSubshell(builder, TABLE.ATOMIC_SUBSHELL, TABLE.ATOMIC_SHELL, id.value, 'atomic subshell', input);
      return;
    default:
      assertNever(id, 'atomic subshell');
  }
}

export function resolveTransition(builder: SelectBuilder, target: ResolveTarget, input: unknown): void {
  const id = normalizeTransition(input);
  switch (id.form) {
    case 'notation':
      builder.addJoin(TABLE.TRANSITION_NOTATION, COLUMN.TRANSITION_ID, target.table, target.column);
      whereNotationLabel(builder, TABLE.TRANSITION_NOTATION, id.label);
      return;
    case 'value':
      builder.addJoin(TABLE.TRANSITION, COLUMN.ID, target.table, target.column);
      builder.addJoin(TABLE.ATOMIC_SUBSHELL, COLUMN.ID, TABLE.TRANSITION, COLUMN.SOURCE_SUBSHELL_ID,
        ALIAS.SOURCE_SUBSHELL);
      builder.addJoin(TABLE.ATOMIC_SUBSHELL, COLUMN.ID, TABLE.TRANSITION, COLUMN.DESTINATION_SUBSHELL_ID,
        ALIAS.DESTINATION_SUBSHELL);
      builder.addJoin(TABLE.ATOMIC_SHELL, COLUMN.ID, ALIAS.SOURCE_SUBSHELL, COLUMN.ATOMIC_SHELL_ID,
        ALIAS.SOURCE_SHELL);
      builder.addJoin(TABLE.ATOMIC_SHELL, COLUMN.ID, ALIAS.DESTINATION_SUBSHELL, COLUMN.ATOMIC_SHELL_ID,
        ALIAS.DESTINATION_SHELL);
      whereSubshell(builder, ALIAS.SOURCE_SUBSHELL, ALIAS.SOURCE_SHELL, id.value.source, 'transition', input);
      whereSubshell(builder, ALIAS.DESTINATION_SUBSHELL, ALIAS.DESTINATION_SHELL, id.value.destination,
        'transition', input);
      return;
    default:
      assertNever(id, 'transition');
  }
}

export function resolveNotation(builder: SelectBuilder, target: ResolveTarget, input: unknown): void {
  const notation = normalizeNotation(input);
  builder.addJoin(TABLE.NOTATION, COLUMN.ID, target.table, target.column);
  builder.addWhere(TABLE.NOTATION, COLUMN.NAME, '=', notation.name);
}

export function resolveLanguage(builder: SelectBuilder, target: ResolveTarget, input: unknown): void {
  const language = normalizeLanguage(input);
  builder.addJoin(TABLE.LANGUAGE, COLUMN.ID, target.table, target.column);
  builder.addWhere(TABLE.LANGUAGE, COLUMN.CODE, '=', language.code);
}

export interface ReferenceResolveOptions {
  /** Used in place of an unspecified reference. */
  defaultReference?: Reference | string;
}

/**
 * Filter on a reference key, or, when none is given, order by the target's
 * reference column so the caller can take the first row deterministically.
 */
export function resolveReference(
  builder: SelectBuilder,
  target: ResolveTarget,
  input: unknown,
  options: ReferenceResolveOptions = {}
): void {
  let id = normalizeReference(input);
  if (id.form === 'unspecified' && options.defaultReference !== undefined) {
    id = normalizeReference(options.defaultReference);
  }
  switch (id.form) {
    case 'unspecified':
      builder.addOrderBy(target.table, target.column);
      return;
    case 'value':
      builder.addJoin(TABLE.REFERENCE, COLUMN.ID, target.table, target.column);
      builder.addWhere(TABLE.REFERENCE, COLUMN.BIBTEX_KEY, '=', id.value.bibtexKey);
      return;
    default:
      assertNever(id, 'reference');
  }
}
