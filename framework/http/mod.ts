/**
 * HTTP Layer
 *
 * Request/response facade, body parsing, error envelope and the node:http
 * host adapter.
 */

export { SpurRequest, normalizeHeaders, normalizePath, type SpurRequestInit, type RequestNormalizeOptions } from './request.ts';
export { SpurResponse } from './response.ts';
export {
  Server,
  IncomingMessageSource,
  ServerResponseSink,
  type ServerOptions,
  type ListenAddress,
  type InboundMessage,
  type OutboundMessage,
} from './server.ts';
export {
  HttpException,
  RouteConfigurationError,
  ResponseFinalizedError,
  isHttpException,
  toHttpException,
  type ErrorDetails,
  type ErrorEnvelope,
} from './errors.ts';
export {
  BodyParserRegistry,
  BaseParser,
  FormParser,
  JsonParser,
  PlainTextParser,
  defaultParsers,
  type BodyParser,
  type FormValue,
} from './parsers.ts';
export type {
  Handler,
  HttpMethod,
  HeaderMap,
  Outcome,
  RouteParams,
  RawRequest,
  RequestSource,
  FinalizedResponse,
  ResponseSink,
} from './types.ts';
