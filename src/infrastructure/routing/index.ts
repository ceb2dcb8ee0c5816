/**
 * @muxkit/core - Routing Module
 *
 * Pattern grammar and the dispatch substrate
 */

export { ServeMux, notFound, writeError } from './mux';
export type { RouteMatch } from './mux';

export { parsePattern, isHttpMethod } from './patterns';
export type { ParsedPattern } from './patterns';
