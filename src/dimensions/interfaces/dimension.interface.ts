/**
 * Dimension name to preference-ranked values, e.g. `{ language: ['de', 'en'] }`.
 * The first value of every dimension is the one content is targeted at.
 */
export type DimensionCombination = Record<string, string[]>;

/**
 * Dimension name to the single value a node is materialized for, e.g. `{ language: 'de' }`.
 */
export type TargetDimensionValues = Record<string, string>;

/**
 * Anything the hashing accepts: ranked combinations, target values or a mix of both.
 */
export type DimensionValues = Record<string, string | readonly string[]>;
