// @luxinema/shared
// Domain types, title normalization, errors, and the rating store database

export * from './db/connection.js';
export * from './db/schema.js';
export * from './db/migrations/index.js';
export * from './types/showtime.js';
export * from './types/rating.js';
export * from './errors/index.js';
export * from './result.js';
export * from './title.js';
