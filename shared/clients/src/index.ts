// REST Client
export { RestClient } from './rest-client';
export type { RestClientOptions, RequestOptions, HttpMethod, QueryParams, QueryValue } from './rest-client';
