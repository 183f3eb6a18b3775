/**
 * Transport module.
 */
export { HttpTransport, discardBody } from './http.js';
export { DEFAULT_TRANSPORT_OPTIONS } from './types.js';
export type {
    FetchFunction,
    FetchInit,
    HttpMethod,
    HttpTransportOptions,
    TransportRequest,
    TransportResponse,
    ByteStreamReader,
} from './types.js';
