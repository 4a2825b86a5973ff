export { SelectBuilder } from './selectBuilder.js';
export type { BuiltQuery, ComparisonOperator, SortDirection, WhereAlternative } from './selectBuilder.js';
