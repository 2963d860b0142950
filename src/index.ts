export { config } from './config/index.js';
export {
  AppError,
  NetworkError,
  type NetworkErrorKind,
  ValidationError,
} from './errors/app-error.js';
export {
  HeaderList,
  type HeaderPair,
  type HeadersInit,
  isSimpleHeader,
  isSimpleMethod,
} from './models/headers.js';
export {
  createOpaqueOrigin,
  isSameOrigin,
  type Origin,
  originOf,
  serializeOrigin,
} from './models/origin.js';
export {
  type CredentialsMode,
  type Destination,
  type RedirectMode,
  type Referrer,
  type ReferrerPolicy,
  Request,
  type RequestMode,
  type RequestOptions,
  type ResponseTainting,
} from './models/request.js';
export { requestFromInit } from './models/request-init.js';
export {
  BodyCell,
  type CacheState,
  type ResponseBody,
  Response,
  type ResponseStatus,
  type ResponseType,
} from './models/response.js';
export { type RequestInit, requestInitSchema } from './schemas/inputs.js';
export {
  DocumentLoader,
  LoadBlocker,
  type LoadKind,
  type LoadType,
} from './services/document-loader.js';
export {
  destroyAgents,
  fetch,
  fetchAsync,
  fetchSync,
  fetchWithCorsCache,
} from './services/fetcher.js';
export {
  createFetchContext,
  type FetchContext,
} from './services/fetcher/context.js';
export { CorsCache } from './services/fetcher/cors-cache.js';
export {
  type FetchTaskTarget,
  NoopFetchTarget,
  ResponseCollector,
} from './services/fetcher/target.js';
export {
  type DevtoolsChannel,
  type DevtoolsEvent,
  FETCH_CHANNEL_NAME,
} from './services/fetcher/telemetry.js';
export {
  HttpTransport,
  type Transport,
  type TransportRequest,
  type TransportResponse,
} from './services/fetcher/transport.js';
