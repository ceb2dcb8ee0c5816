export type { NodeRequestListener } from './NodeHttpAdapter';
export {
  NodeHttpAdapter,
  NodeResponseWriter,
  createNodeHttpAdapter,
  createRequestListener,
  toMuxRequest,
} from './NodeHttpAdapter';
