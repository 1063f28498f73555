/**
 * DI symbols of the platform headers system. Symbol.for() keeps them identical
 * across module copies, which multi-binding relies on.
 */
export const HEADER_TYPES = {
    PlatformHeadersExtension: Symbol.for('PlatformHeadersExtension'),
};
