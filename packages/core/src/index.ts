/**
 * @crossbar/core
 *
 * Foundational, shared types and schemas.
 * This package has zero dependencies on other @crossbar packages.
 */

export * from './market/types.js';
export * from './market/schemas.js';
