/**
 * @muxkit/core - Context Module
 *
 * Request-scoped context propagation
 */

export type { IContext, MuxContextData } from './IContext';
export { RequestContext, getCurrentContext } from './RequestContext';
