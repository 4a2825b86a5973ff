import { describe, it, expect } from 'vitest';
import { Reference } from '../src/model/index.js';
import { SelectBuilder } from '../src/query/index.js';
import {
  resolveAtomicShell,
  resolveAtomicSubshell,
  resolveElement,
  resolveLanguage,
  resolveNotation,
  resolveReference,
  resolveTransition,
} from '../src/resolve/index.js';
import { captureError } from './helpers/errors.js';
import { K, L3, line } from './helpers/subshells.js';

const BASE = 'SELECT transition_energy.value_eV FROM transition_energy';

function energyQuery(): SelectBuilder {
  return new SelectBuilder().addSelect('transition_energy', 'value_eV').addFrom('transition_energy');
}

describe('resolveElement', () => {
  const target = { table: 'transition_energy', column: 'element_id' };

  it('matches a label against names and symbols', () => {
    const builder = energyQuery();
    resolveElement(builder, target, 'Fe');
    expect(builder.build()).toEqual({
      sql:
        `${BASE} INNER JOIN element_name ON element_name.element_id = transition_energy.element_id ` +
        'INNER JOIN element_symbol ON element_symbol.element_id = transition_energy.element_id ' +
        'WHERE (element_name.name = ? OR element_symbol.symbol = ?)',
      params: ['Fe', 'Fe'],
    });
  });

  it('filters on the atomic number', () => {
    const builder = energyQuery();
    resolveElement(builder, target, 26);
    expect(builder.build()).toEqual({
      sql: `${BASE} INNER JOIN element ON element.id = transition_energy.element_id WHERE element.atomic_number = ?`,
      params: [26],
    });
  });

  it('leaves the builder untouched when the input is rejected', () => {
    const builder = energyQuery();
    expect(captureError(() => resolveElement(builder, target, 119)).code).toBe('VALIDATION_ERROR');
    expect(captureError(() => resolveElement(builder, target, { z: 26 })).code).toBe('UNRESOLVED_IDENTIFIER');
    expect(builder.build()).toEqual({ sql: BASE, params: [] });
  });
});

describe('resolveAtomicShell', () => {
  const target = { table: 'shell_energy', column: 'atomic_shell_id' };

  it('filters on n', () => {
    const builder = new SelectBuilder().addFrom('shell_energy');
    resolveAtomicShell(builder, target, 2);
    expect(builder.build().sql).toBe(
      'SELECT * FROM shell_energy INNER JOIN atomic_shell ON atomic_shell.id = shell_energy.atomic_shell_id ' +
      'WHERE atomic_shell.principal_quantum_number = ?'
    );
  });

  it('looks a label up in both renderings', () => {
    const builder = new SelectBuilder().addFrom('shell_energy');
    resolveAtomicShell(builder, target, 'L');
    expect(builder.build()).toEqual({
      sql:
        'SELECT * FROM shell_energy INNER JOIN atomic_shell_notation ' +
        'ON atomic_shell_notation.atomic_shell_id = shell_energy.atomic_shell_id ' +
        'WHERE (atomic_shell_notation.ascii = ? OR atomic_shell_notation.utf16 = ?)',
      params: ['L', 'L'],
    });
  });
});

describe('resolveAtomicSubshell', () => {
  const target = { table: 'subshell_energy', column: 'atomic_subshell_id' };

  it('joins the subshell and its shell and filters n, l and 2j', () => {
    const builder = new SelectBuilder().addFrom('subshell_energy');
    resolveAtomicSubshell(builder, target, [2, 1, 3]);
    expect(builder.build()).toEqual({
      sql:
        'SELECT * FROM subshell_energy ' +
        'INNER JOIN atomic_subshell ON atomic_subshell.id = subshell_energy.atomic_subshell_id ' +
        'INNER JOIN atomic_shell ON atomic_shell.id = atomic_subshell.atomic_shell_id ' +
        'WHERE atomic_shell.principal_quantum_number = ? ' +
        'AND atomic_subshell.azimuthal_quantum_number = ? ' +
        'AND atomic_subshell.total_angular_momentum_nominator = ?',
      params: [2, 1, 3],
    });
  });

  it('rejects an impossible triple before emitting any filter', () => {
    const builder = new SelectBuilder().addFrom('subshell_energy');
    expect(captureError(() => resolveAtomicSubshell(builder, target, [0, 0, 1])).code).toBe('VALIDATION_ERROR');
    expect(captureError(() => resolveAtomicSubshell(builder, target, [2, -1, 1])).code).toBe('VALIDATION_ERROR');
    expect(builder.build()).toEqual({ sql: 'SELECT * FROM subshell_energy', params: [] });
  });

  it('accepts a label', () => {
    const builder = new SelectBuilder().addFrom('subshell_energy');
    resolveAtomicSubshell(builder, target, 'L3');
    expect(builder.build().params).toEqual(['L3', 'L3']);
  });
});

describe('resolveTransition', () => {
  const target = { table: 'transition_energy', column: 'transition_id' };

  it('filters both ends through aliased subshell and shell joins', () => {
    const builder = energyQuery();
    resolveTransition(builder, target, line(K, L3));
    expect(builder.build()).toEqual({
      sql:
        `${BASE} INNER JOIN transition ON transition.id = transition_energy.transition_id ` +
        'INNER JOIN atomic_subshell AS srcsubshell ON srcsubshell.id = transition.source_subshell_id ' +
        'INNER JOIN atomic_subshell AS dstsubshell ON dstsubshell.id = transition.destination_subshell_id ' +
        'INNER JOIN atomic_shell AS srcshell ON srcshell.id = srcsubshell.atomic_shell_id ' +
        'INNER JOIN atomic_shell AS dstshell ON dstshell.id = dstsubshell.atomic_shell_id ' +
        'WHERE srcshell.principal_quantum_number = ? ' +
        'AND srcsubshell.azimuthal_quantum_number = ? ' +
        'AND srcsubshell.total_angular_momentum_nominator = ? ' +
        'AND dstshell.principal_quantum_number = ? ' +
        'AND dstsubshell.azimuthal_quantum_number = ? ' +
        'AND dstsubshell.total_angular_momentum_nominator = ?',
      params: [2, 1, 3, 1, 0, 1],
    });
  });

  it('gives the same query for every structured form', () => {
    const fromInstance = energyQuery();
    resolveTransition(fromInstance, target, line(K, L3));
    const fromSextuple = energyQuery();
    resolveTransition(fromSextuple, target, [2, 1, 3, 1, 0, 1]);
    const fromPair = energyQuery();
    resolveTransition(fromPair, target, [[2, 1, 3], K]);

    expect(fromSextuple.build()).toEqual(fromInstance.build());
    expect(fromPair.build()).toEqual(fromInstance.build());
  });

  it('looks a label up in the transition notation table', () => {
    const builder = energyQuery();
    resolveTransition(builder, target, 'K-L3');
    expect(builder.build()).toEqual({
      sql:
        `${BASE} INNER JOIN transition_notation ON transition_notation.transition_id = transition_energy.transition_id ` +
        'WHERE (transition_notation.ascii = ? OR transition_notation.utf16 = ?)',
      params: ['K-L3', 'K-L3'],
    });
  });
});

describe('resolveNotation and resolveLanguage', () => {
  it('filter by lower-cased name and code', () => {
    const builder = new SelectBuilder().addFrom('element_name');
    resolveNotation(builder, { table: 'element_name', column: 'notation_id' }, 'Siegbahn');
    resolveLanguage(builder, { table: 'element_name', column: 'language_id' }, 'EN');
    expect(builder.build()).toEqual({
      sql:
        'SELECT * FROM element_name ' +
        'INNER JOIN notation ON notation.id = element_name.notation_id ' +
        'INNER JOIN language ON language.id = element_name.language_id ' +
        'WHERE notation.name = ? AND language.code = ?',
      params: ['siegbahn', 'en'],
    });
  });
});

describe('resolveReference', () => {
  const target = { table: 'transition_energy', column: 'reference_id' };

  it('orders by the reference column when none is given', () => {
    const builder = energyQuery();
    resolveReference(builder, target, null);
    expect(builder.build()).toEqual({
      sql: `${BASE} ORDER BY transition_energy.reference_id ASC`,
      params: [],
    });
  });

  it('filters on the BibTeX key', () => {
    const builder = energyQuery();
    resolveReference(builder, target, new Reference('campbell2001'));
    expect(builder.build()).toEqual({
      sql: `${BASE} INNER JOIN ref ON ref.id = transition_energy.reference_id WHERE ref.bibtexkey = ?`,
      params: ['campbell2001'],
    });
  });

  it('falls back to the default reference only when none is given', () => {
    const withDefault = energyQuery();
    resolveReference(withDefault, target, undefined, { defaultReference: 'krause1979' });
    expect(withDefault.build().params).toEqual(['krause1979']);

    const explicit = energyQuery();
    resolveReference(explicit, target, 'campbell2001', { defaultReference: 'krause1979' });
    expect(explicit.build().params).toEqual(['campbell2001']);
  });
});
