/**
 * Default value registry.
 *
 * @packageDocumentation
 */

export { DefaultValueRegistry, keyOf, primitiveFiller } from './default-values.js';
