/**
 * @module @muxkit/core/application/host
 * @description Hosting layer exports
 */

export { MuxHost, consoleLogger, createHost } from './host';
export type { IHost, ILogger, HostOptions, HostStatus } from './host';
