/** Tables the generated queries assume. */
export const TABLE = {
  ELEMENT: 'element',
  ELEMENT_NAME: 'element_name',
  ELEMENT_SYMBOL: 'element_symbol',
  ATOMIC_SHELL: 'atomic_shell',
  ATOMIC_SHELL_NOTATION: 'atomic_shell_notation',
  ATOMIC_SUBSHELL: 'atomic_subshell',
  ATOMIC_SUBSHELL_NOTATION: 'atomic_subshell_notation',
  TRANSITION: 'transition',
  TRANSITION_NOTATION: 'transition_notation',
  TRANSITIONSET: 'transitionset',
  TRANSITIONSET_ASSOCIATION: 'transitionset_association',
  TRANSITIONSET_NOTATION: 'transitionset_notation',
  NOTATION: 'notation',
  LANGUAGE: 'language',
  REFERENCE: 'ref',
} as const;

export const COLUMN = {
  ID: 'id',
  ELEMENT_ID: 'element_id',
  ATOMIC_NUMBER: 'atomic_number',
  NAME: 'name',
  SYMBOL: 'symbol',
  ATOMIC_SHELL_ID: 'atomic_shell_id',
  PRINCIPAL_QUANTUM_NUMBER: 'principal_quantum_number',
  ATOMIC_SUBSHELL_ID: 'atomic_subshell_id',
  AZIMUTHAL_QUANTUM_NUMBER: 'azimuthal_quantum_number',
  TOTAL_ANGULAR_MOMENTUM_NOMINATOR: 'total_angular_momentum_nominator',
  TRANSITION_ID: 'transition_id',
  SOURCE_SUBSHELL_ID: 'source_subshell_id',
  DESTINATION_SUBSHELL_ID: 'destination_subshell_id',
  TRANSITIONSET_ID: 'transitionset_id',
  MEMBER_COUNT: 'count',
  NOTATION_ID: 'notation_id',
  LANGUAGE_ID: 'language_id',
  REFERENCE_ID: 'reference_id',
  CODE: 'code',
  BIBTEX_KEY: 'bibtexkey',
  ASCII: 'ascii',
  UTF16: 'utf16',
} as const;

/** Aliases for tables joined twice within one transition filter. */
export const ALIAS = {
  SOURCE_SUBSHELL: 'srcsubshell',
  DESTINATION_SUBSHELL: 'dstsubshell',
  SOURCE_SHELL: 'srcshell',
  DESTINATION_SHELL: 'dstshell',
} as const;

export const ENTITY_KINDS = [
  'element',
  'atomic_shell',
  'atomic_subshell',
  'transition',
  'transitionset',
  'notation',
  'language',
  'reference',
] as const;

export type EntityKind = typeof ENTITY_KINDS[number];

/** Column names of the rows a transition-set candidate query returns. */
export const MATCH_ROW = {
  TRANSITIONSET_ID: 'transitionset_id',
  MEMBER_COUNT: 'member_count',
} as const;
