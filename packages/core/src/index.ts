/**
 * @fileoverview @switchyard/core
 *
 * Ambient infrastructure shared by every Switchyard package:
 * structured logging and settings.
 */

export * from './logging/index.js';
export * from './settings/index.js';
