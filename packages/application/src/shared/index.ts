/**
 * @fileoverview Shared Application Types
 *
 * @module application/shared
 */

export * from './Result.js';
