/**
 * Domain Layer - grouping decisions over typed commits, no I/O.
 *
 * Everything here is synchronous. Reading history and rewriting it belong to
 * the services and operations layers.
 */

export { BoundaryClassifier } from './BoundaryClassifier'
export { areKeysCompatible, extractCorrelationKey } from './CorrelationKey'
export { GroupingEngine } from './GroupingEngine'
export type { AgeFilterOptions, GroupingOptions } from './GroupingEngine'
export { IdentityResolver, buildAliasTable } from './IdentityResolver'
export { buildSquashMessage, remapGroup } from './SquashMessage'
