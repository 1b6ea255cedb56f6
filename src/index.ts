/**
 * renterd api client
 *
 * Typed access to the bus, worker and autopilot endpoints of a renterd node,
 * with seekable streaming downloads:
 * - Object download, upload and deletion through the worker
 * - Random-access object streams over HTTP range requests
 * - Bus, worker and autopilot state
 * - Configuration from code or `RENTERD_*` environment variables
 *
 * @module renterd-client
 * @example
 * ```typescript
 * import { ClientBuilder } from 'renterd-client';
 *
 * const client = new ClientBuilder()
 *   .apiEndpointUrl('http://localhost:9980/api')
 *   .apiPassword('test-secret')
 *   .build();
 *
 * const object = await client.worker.objects.download('videos/intro.mp4');
 * if (object?.seekable) {
 *   const stream = await object.openSeekableStream(1024);
 *   const bytes = await stream.read(4096);
 *   await stream.close();
 * }
 *
 * await client.close();
 * ```
 */

// ============================================================================
// Client API
// ============================================================================

export { Client, ClientBuilder, createClient, createClientFromEnv } from './client/index.js';
export type { ClientDependencies, ClientOverrides } from './client/index.js';

// ============================================================================
// Endpoints
// ============================================================================

export { Bus, type BusState } from './bus/index.js';
export { Autopilot, type AutopilotState } from './autopilot/index.js';
export {
  Worker,
  WorkerMemory,
  WorkerObjects,
  DownloadableObject,
  type ObjectMetadata,
  type Memory,
  type MemoryStatus,
  type WorkerState,
  type DownloadOptions,
  type UploadOptions,
  type DeleteOptions,
} from './worker/index.js';
export type { CommonState } from './types/index.js';

// ============================================================================
// Streaming
// ============================================================================

export {
  SeekableObjectStream,
  type SeekOrigin,
  type StreamState,
  type ReadOptions,
  type ReadResult,
  type SeekOptions,
  type SeekableStreamOptions,
  type RemoteObjectHandle,
  type ByteRange,
} from './streaming/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  normalizeConfig,
  createConfigFromEnv,
  ENV_VARS,
  type ClientConfig,
  type NormalizedClientConfig,
  type RangeFallback,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  RenterdError,
  AuthError,
  CancelledError,
  ConfigError,
  HttpResponseError,
  NotFoundError,
  NotSeekableError,
  ProtocolError,
  RangeNotSatisfiableError,
  StreamStateError,
  TransportError,
  UnknownLengthError,
  ValidationError,
  isRenterdError,
  isRetryableError,
} from './errors/index.js';

// ============================================================================
// Transport and execution
// ============================================================================

export {
  ApiRequestBuilder,
  ApiRequestExecutor,
  type ApiRequest,
  type RequestExecutor,
  type RateLimitPolicy,
  type ExecuteOptions,
} from './executor/index.js';
export {
  UndiciTransport,
  type HttpTransport,
  type HttpRequest,
  type HttpResponse,
  type ByteSource,
} from './transport/index.js';

// ============================================================================
// Observability
// ============================================================================

export { ConsoleLogger, NoopLogger, InMemoryLogger, type Logger, type LogLevel } from './observability/index.js';
