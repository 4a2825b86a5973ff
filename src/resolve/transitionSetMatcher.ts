import { z } from 'zod';
import { COLUMN, MATCH_ROW, TABLE } from '../constants.js';
import { parseRows, type QueryExecutor } from '../db/executor.js';
import type { Transition, TransitionLike, TransitionSet } from '../model/index.js';
import { SelectBuilder, type BuiltQuery } from '../query/index.js';
import { ambiguousMatch, invalidParams, log, notFound, unresolvedIdentifier } from '../shared/index.js';
import { normalizeTransitionSet } from './normalize.js';
import { resolveTransition, type ResolveTarget } from './resolvers.js';

export interface MatchOptions {
  signal?: AbortSignal;
}

const CandidateRowSchema = z.object({
  [MATCH_ROW.TRANSITIONSET_ID]: z.number().int(),
  [MATCH_ROW.MEMBER_COUNT]: z.number().int().nonnegative(),
});

/** Stored sets containing `transition`, with their cached member counts. */
export function buildCandidateQuery(transition: Transition): BuiltQuery {
  const builder = new SelectBuilder()
    .setDistinct()
    .addSelect(TABLE.TRANSITIONSET_ASSOCIATION, COLUMN.TRANSITIONSET_ID, MATCH_ROW.TRANSITIONSET_ID)
    .addSelect(TABLE.TRANSITIONSET, COLUMN.MEMBER_COUNT, MATCH_ROW.MEMBER_COUNT)
    .addFrom(TABLE.TRANSITIONSET_ASSOCIATION)
    .addJoin(TABLE.TRANSITIONSET, COLUMN.ID, TABLE.TRANSITIONSET_ASSOCIATION, COLUMN.TRANSITIONSET_ID);
  resolveTransition(builder, { table: TABLE.TRANSITIONSET_ASSOCIATION, column: COLUMN.TRANSITION_ID }, transition);
  return builder.build();
}

function intersect(current: Map<number, number>, found: Map<number, number>): Map<number, number> {
  const out = new Map<number, number>();
  for (const [id, count] of current) {
    if (found.has(id)) out.set(id, count);
  }
  return out;
}

/**
 * Find the key of the one stored transition set whose members are exactly
 * `transitions`: candidates are intersected transition by transition, then
 * narrowed to sets whose cached member count equals the requested size so
 * that a stored superset never matches.
 */
export async function buildTransitionSetMatch(
  transitions: TransitionSet | readonly TransitionLike[],
  executor: QueryExecutor,
  options: MatchOptions = {}
): Promise<number> {
  const normalized = normalizeTransitionSet(transitions);
  if (normalized.form !== 'value') {
    throw unresolvedIdentifier('transitionset', transitions);
  }
  const set = normalized.value;
  const requested = set.transitions.map(t => t.key);

  let candidates: Map<number, number> | undefined;
  for (const transition of set) {
    options.signal?.throwIfAborted();

    const { sql, params } = buildCandidateQuery(transition);
    const rows = parseRows(await executor(sql, params, { signal: options.signal }), CandidateRowSchema, { sql });
    const found = new Map<number, number>(rows.map(r => [r.transitionset_id, r.member_count]));

    candidates = candidates === undefined ? found : intersect(candidates, found);
    log.debug('transition set candidates', { transition: transition.key, candidates: [...candidates.keys()] });

    if (candidates.size === 0) {
      throw notFound(`No stored transition set contains all of ${set.toString()}`, {
        kind: 'transitionset',
        transitions: requested,
        unmatched: transition.key,
      });
    }
  }

  const exact = [...(candidates ?? new Map<number, number>())]
    .filter(([, count]) => count === set.size)
    .map(([id]) => id)
    .sort((a, b) => a - b);

  const [match] = exact;
  if (match === undefined) {
    throw notFound(`No stored transition set has exactly ${set.toString()}`, {
      kind: 'transitionset',
      transitions: requested,
    });
  }
  if (exact.length > 1) {
    throw ambiguousMatch(`${exact.length} stored transition sets have exactly ${set.toString()}`, {
      kind: 'transitionset',
      transitions: requested,
      candidates: exact,
    });
  }
  return match;
}

export interface TransitionSetResolveOptions extends MatchOptions {
  executor?: QueryExecutor;
}

/** Label lookup through the notation table, or an exact membership match. */
export async function resolveTransitionSet(
  builder: SelectBuilder,
  target: ResolveTarget,
  input: unknown,
  options: TransitionSetResolveOptions = {}
): Promise<void> {
  const id = normalizeTransitionSet(input);
  if (id.form === 'notation') {
    builder.addJoin(TABLE.TRANSITIONSET_NOTATION, COLUMN.TRANSITIONSET_ID, target.table, target.column);
    builder.addWhere(TABLE.TRANSITIONSET_NOTATION, COLUMN.ASCII, '=', id.label,
      [TABLE.TRANSITIONSET_NOTATION, COLUMN.UTF16, '=', id.label]);
    return;
  }

  if (!options.executor) {
    throw invalidParams('A query executor is required to match a transition set by its members');
  }
  const key = await buildTransitionSetMatch(id.value, options.executor, { signal: options.signal });
  builder.addJoin(TABLE.TRANSITIONSET, COLUMN.ID, target.table, target.column);
  builder.addWhere(TABLE.TRANSITIONSET, COLUMN.ID, '=', key);
}
