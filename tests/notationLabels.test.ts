import { describe, it, expect } from 'vitest';
import {
  AtomicShell,
  AtomicSubshell,
  NOTATION_SIEGBAHN,
  atomicShellLabel,
  atomicSubshellLabel,
  MAX_LABELLED_N,
  listSubshells,
  subshellIndex,
  transitionLabel,
} from '../src/model/index.js';
import { isXrayDbError } from '../src/shared/index.js';
import { K, L1, L2, L3, M5, line } from './helpers/subshells.js';

describe('subshellIndex', () => {
  it('numbers subshells by l then 2j', () => {
    expect(subshellIndex(K)).toBe(1);
    expect(subshellIndex(L1)).toBe(1);
    expect(subshellIndex(L2)).toBe(2);
    expect(subshellIndex(L3)).toBe(3);
    expect(subshellIndex(M5)).toBe(5);
  });

  it('lists 2n-1 subshells per shell', () => {
    expect(listSubshells(2).map(s => s.key)).toEqual(['1,0,1', '2,0,1', '2,1,1', '2,1,3']);
    expect(listSubshells()).toHaveLength(49);
    expect(listSubshells().every(s => s.n <= MAX_LABELLED_N)).toBe(true);
  });
});

describe('atomicShellLabel', () => {
  it('uses letters, or the number in orbital notation', () => {
    expect(atomicShellLabel(new AtomicShell(1)).ascii).toBe('K');
    expect(atomicShellLabel(new AtomicShell(7), 'siegbahn').ascii).toBe('Q');
    expect(atomicShellLabel(new AtomicShell(3), 'orbital').ascii).toBe('3');
  });

  it('has no label beyond Q', () => {
    expect(atomicShellLabel(new AtomicShell(MAX_LABELLED_N)).ascii).toBe('Q');
    try {
      atomicShellLabel(new AtomicShell(MAX_LABELLED_N + 1));
      expect.unreachable();
    } catch (err) {
      expect(isXrayDbError(err, 'VALIDATION_ERROR')).toBe(true);
    }
  });
});

describe('atomicSubshellLabel', () => {
  it('renders IUPAC labels in all four encodings', () => {
    expect(atomicSubshellLabel(L3)).toEqual({
      ascii: 'L3',
      utf16: 'L3',
      html: 'L<sub>3</sub>',
      latex: 'L$_{3}$',
    });
    expect(atomicSubshellLabel(K, 'IUPAC').html).toBe('K');
  });

  it('renders Siegbahn labels with roman numerals', () => {
    expect(atomicSubshellLabel(L2, NOTATION_SIEGBAHN).ascii).toBe('LII');
    expect(atomicSubshellLabel(M5, 'siegbahn').ascii).toBe('MV');
    expect(atomicSubshellLabel(K, 'siegbahn').ascii).toBe('K');
  });

  it('renders orbital labels with j as a fraction', () => {
    expect(atomicSubshellLabel(M5, 'orbital')).toEqual({
      ascii: '3d5/2',
      utf16: '3d5/2',
      html: '3d<sub>5/2</sub>',
      latex: '3d$_{5/2}$',
    });
    expect(atomicSubshellLabel(new AtomicSubshell(1, 0, 1), 'orbital').ascii).toBe('1s1/2');
  });

  it('rejects an unknown notation', () => {
    try {
      atomicSubshellLabel(L3, 'greek');
      expect.unreachable();
    } catch (err) {
      expect(isXrayDbError(err, 'INVALID_PARAMS')).toBe(true);
    }
  });
});

describe('transitionLabel', () => {
  it('puts the destination first', () => {
    expect(transitionLabel(line(K, L3))).toEqual({
      ascii: 'K-L3',
      utf16: 'K–L3',
      html: 'K&ndash;L<sub>3</sub>',
      latex: 'K--L$_{3}$',
    });
    expect(transitionLabel(line(L3, M5)).ascii).toBe('L3-M5');
  });

  it('only exists in IUPAC notation', () => {
    try {
      transitionLabel(line(K, L3), 'siegbahn');
      expect.unreachable();
    } catch (err) {
      expect(isXrayDbError(err, 'INVALID_PARAMS')).toBe(true);
    }
  });
});
