/**
 * @module @muxkit/core/application/ports
 * @description Adapter contracts
 */

export { AdapterBase } from './adapter';
export type { IAdapter, AdapterOptions, ServerInfo } from './adapter';
