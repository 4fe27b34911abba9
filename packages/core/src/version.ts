/**
 * Runtime version constants
 *
 * Used for catalog compatibility checks and for tagging persisted and
 * replicated state.
 */

/**
 * Engine semantic version. Catalog packs declare the range of engine
 * versions they support against this value.
 *
 * IMPORTANT: This must stay in sync with packages/core/package.json version.
 */
export const RUNTIME_VERSION = '0.1.0';

/**
 * Schema version written into serialized scheduler and discovery gate state.
 *
 * Increment when the attribute layout changes in a backwards-incompatible way.
 */
export const PERSISTENCE_SCHEMA_VERSION = 1;
