/**
 * @projectkit/source
 *
 * Source URI resolution: the driver contract, the scheme registry, the
 * resolver and the built-in local driver.
 */

export { SCHEME_SEPARATOR } from './driver.js'
export type { Driver, SourceResolver } from './driver.js'
export { DriverRegistry } from './registry.js'
export { parseScheme, Resolver } from './resolver.js'
export { LOCAL_SCHEME, LocalDriver } from './local-driver.js'
export type { LocalDriverOptions } from './local-driver.js'
