export type {
  ServiceConfig,
  LogLevel,
  HealthResponse,
  ServiceError,
  APIResponse,
} from './service';
