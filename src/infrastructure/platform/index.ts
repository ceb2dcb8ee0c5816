/**
 * @module @muxkit/core/infrastructure/platform
 * @description Request/response surface and built-in middleware
 */

export { HttpStatus, createRequest, withPath, withParams } from './types';
export type {
  HeaderValue,
  MuxRequest,
  ResponseWriter,
  RequestHandler,
  Wrapper,
  RequestInit,
} from './types';

export { ResponseRecorder } from './recorder';

export {
  isMiddleware,
  createMiddleware,
  MiddlewareBase,
  StatusRecorder,
  RecoveryMiddleware,
  AccessLogMiddleware,
  defaultRecoveryAction,
} from './middleware';
export type {
  IMiddleware,
  MiddlewareFunction,
  RecoveryAction,
  LogFunction,
} from './middleware';
