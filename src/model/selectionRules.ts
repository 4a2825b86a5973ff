import type { AtomicSubshell } from './atomicSubshell.js';

/**
 * Radiative selection rules between two subshells: electric dipole or
 * electric quadrupole, never within one shell.
 */
export function isRadiative(source: AtomicSubshell, destination: AtomicSubshell): boolean {
  if (source.n === destination.n) return false;

  const deltaJN = Math.abs(destination.jN - source.jN);
  const deltaL = Math.abs(destination.l - source.l);

  return electricDipolePermitted(deltaJN, deltaL) ||
    electricQuadrupolePermitted(deltaJN, deltaL, source.jN, destination.jN);
}

export function electricDipolePermitted(deltaJN: number, deltaL: number): boolean {
  return deltaJN <= 2 && deltaL === 1;
}

export function electricQuadrupolePermitted(
  deltaJN: number,
  deltaL: number,
  sourceJN: number,
  destinationJN: number
): boolean {
  if (deltaJN > 4) return false;
  // j=1/2 -> j=1/2 is forbidden for quadrupole radiation
  if (sourceJN === 1 && destinationJN === 1) return false;
  return deltaL === 0 || deltaL === 2;
}

export function isCosterKronig(source: AtomicSubshell, destination: AtomicSubshell): boolean {
  return source.n === destination.n;
}
