/**
 * @muxkit/core - Exception Module
 */

export {
  MuxException,
  ConfigurationError,
  RequestFault,
} from './exceptions';

export type {
  ConfigurationErrorCode,
  FaultOrigin,
} from './exceptions';
