import { invalidParams, queryConflict } from '../shared/index.js';
import type { SqlParam } from '../db/executor.js';

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'LIKE';

export type SortDirection = 'ASC' | 'DESC';

/** One alternative of a disjunctive filter: `[tableOrAlias, column, operator, value]`. */
export type WhereAlternative = readonly [tableOrAlias: string, column: string, operator: ComparisonOperator, value: SqlParam];

export interface BuiltQuery {
  sql: string;
  params: SqlParam[];
}

interface SelectColumn {
  table: string;
  column: string;
  alias?: string;
}

interface JoinSpec {
  table: string;
  key: string;
  fromTable: string;
  fromKey: string;
  alias: string;
}

interface Predicate {
  table: string;
  column: string;
  operator: ComparisonOperator;
  value: SqlParam;
}

interface OrderBy {
  table: string;
  column: string;
  direction: SortDirection;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const OPERATORS: readonly ComparisonOperator[] = ['=', '!=', '<', '<=', '>', '>=', 'LIKE'];

function identifier(kind: string, value: string): string {
  if (!IDENTIFIER_RE.test(value)) {
    throw invalidParams(`Invalid SQL ${kind}: ${JSON.stringify(value)}`, { [kind]: value });
  }
  return value;
}

function isComparisonOperator(value: string): value is ComparisonOperator {
  return OPERATORS.some(op => op === value);
}

function comparisonOperator(value: string): ComparisonOperator {
  if (!isComparisonOperator(value)) {
    throw invalidParams(`Unsupported operator: ${value}`, { operator: value });
  }
  return value;
}

/**
 * Accumulates the pieces of one SELECT statement. Values are only ever bound
 * through `?` placeholders; table, alias and column names are checked
 * against a plain identifier pattern.
 *
 * A builder belongs to the call that created it and is not meant to be
 * shared between concurrent resolutions.
 */
export class SelectBuilder {
  private readonly selects: SelectColumn[] = [];
  private fromTable: string | undefined;
  private distinct = false;
  private readonly joins = new Map<string, JoinSpec>();
  private readonly wheres: Predicate[][] = [];
  private readonly orderBys: OrderBy[] = [];

  addSelect(table: string, column: string, alias?: string): this {
    this.selects.push({
      table: identifier('table', table),
      column: identifier('column', column),
      ...(alias !== undefined ? { alias: identifier('alias', alias) } : {}),
    });
    return this;
  }

  addFrom(table: string): this {
    const name = identifier('table', table);
    if (this.fromTable !== undefined && this.fromTable !== name) {
      throw queryConflict(`FROM table already set to ${this.fromTable}`, { from: this.fromTable, requested: name });
    }
    if (this.joins.has(name)) {
      throw queryConflict(`FROM table ${name} is already used as a join alias`, { from: name });
    }
    this.fromTable = name;
    return this;
  }

  setDistinct(distinct = true): this {
    this.distinct = distinct;
    return this;
  }

  /**
   * Join `table` (as `alias`, default the table name) on
   * `alias.key = fromTable.fromKey`. Re-adding the same join is a no-op;
   * reusing an alias for a different join is a conflict.
   */
  addJoin(table: string, key: string, fromTable: string, fromKey: string, alias?: string): this {
    const spec: JoinSpec = {
      table: identifier('table', table),
      key: identifier('column', key),
      fromTable: identifier('table', fromTable),
      fromKey: identifier('column', fromKey),
      alias: identifier('alias', alias ?? table),
    };

    // Joining the FROM table onto itself through the same column adds nothing
    if (spec.alias === this.fromTable) {
      if (spec.table === this.fromTable && spec.fromTable === this.fromTable && spec.key === spec.fromKey) {
        return this;
      }
      throw queryConflict(`Alias ${spec.alias} is already the FROM table`, { join: spec });
    }

    const existing = this.joins.get(spec.alias);
    if (existing) {
      if (
        existing.table === spec.table &&
        existing.key === spec.key &&
        existing.fromTable === spec.fromTable &&
        existing.fromKey === spec.fromKey
      ) {
        return this;
      }
      throw queryConflict(`Conflicting join for alias ${spec.alias}`, { existing, requested: spec });
    }

    this.joins.set(spec.alias, spec);
    return this;
  }

  /**
   * Add a filter. With alternatives the clause becomes a disjunction, e.g.
   * matching a label against either its ASCII or its wide rendering.
   */
  addWhere(
    tableOrAlias: string,
    column: string,
    operator: ComparisonOperator,
    value: SqlParam,
    ...alternatives: WhereAlternative[]
  ): this {
    const clause = [[tableOrAlias, column, operator, value] as const, ...alternatives].map(
      ([table, col, op, val]): Predicate => ({
        table: identifier('table', table),
        column: identifier('column', col),
        operator: comparisonOperator(op),
        value: checkParam(val),
      })
    );
    this.wheres.push(clause);
    return this;
  }

  addOrderBy(tableOrAlias: string, column: string, direction: SortDirection = 'ASC'): this {
    if (direction !== 'ASC' && direction !== 'DESC') {
      throw invalidParams(`Unsupported sort direction: ${String(direction)}`, { direction });
    }
    const order: OrderBy = {
      table: identifier('table', tableOrAlias),
      column: identifier('column', column),
      direction,
    };
    const duplicate = this.orderBys.some(o => o.table === order.table && o.column === order.column);
    if (!duplicate) this.orderBys.push(order);
    return this;
  }

  hasJoin(alias: string): boolean {
    return this.joins.has(alias) || alias === this.fromTable;
  }

  build(): BuiltQuery {
    if (this.fromTable === undefined) {
      throw invalidParams('Cannot build a query without a FROM table');
    }

    const known = new Set<string>([this.fromTable]);
    const joinSql: string[] = [];
    for (const join of this.joins.values()) {
      if (!known.has(join.fromTable)) {
        throw invalidParams(`Join ${join.alias} refers to unknown table ${join.fromTable}`, { join });
      }
      const target = join.alias === join.table ? join.table : `${join.table} AS ${join.alias}`;
      joinSql.push(`INNER JOIN ${target} ON ${join.alias}.${join.key} = ${join.fromTable}.${join.fromKey}`);
      known.add(join.alias);
    }

    const columns = this.selects.length === 0
      ? '*'
      : this.selects.map(s => `${s.table}.${s.column}${s.alias ? ` AS ${s.alias}` : ''}`).join(', ');

    const parts = [`SELECT ${this.distinct ? 'DISTINCT ' : ''}${columns}`, `FROM ${this.fromTable}`, ...joinSql];
    const params: SqlParam[] = [];

    if (this.wheres.length > 0) {
      const clauses = this.wheres.map(clause => {
        const predicates = clause.map(p => {
          params.push(p.value);
          return `${p.table}.${p.column} ${p.operator} ?`;
        });
        return predicates.length === 1 ? predicates.join('') : `(${predicates.join(' OR ')})`;
      });
      parts.push(`WHERE ${clauses.join(' AND ')}`);
    }

    if (this.orderBys.length > 0) {
      parts.push(`ORDER BY ${this.orderBys.map(o => `${o.table}.${o.column} ${o.direction}`).join(', ')}`);
    }

    return { sql: parts.join(' '), params };
  }
}

function checkParam(value: SqlParam): SqlParam {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw invalidParams('Filter value must be a finite number', { value: String(value) });
  }
  if (typeof value !== 'number' && typeof value !== 'string') {
    throw invalidParams('Filter value must be a string or a number', { value });
  }
  return value;
}
