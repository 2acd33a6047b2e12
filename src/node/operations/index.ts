/**
 * Operations Layer - orchestrates domain decisions and services into runs.
 */

export { CollapseOperation } from './CollapseOperation'
export type { CollapseResult } from './CollapseOperation'
export { SquashOperation } from './SquashOperation'
export type { SquashRunOptions } from './SquashOperation'
