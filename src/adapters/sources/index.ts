/**
 * Source Adapters Index
 *
 * Exports all ticker-mention source adapters
 */

export * from './base-source-adapter';
export * from './news-adapter';
export * from './institutional-adapter';
export * from './reddit-adapter';
export * from './social-adapter';
