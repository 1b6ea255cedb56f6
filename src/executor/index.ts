/**
 * Request execution layer
 */

export {
  ApiRequestBuilder,
  encodeObjectPath,
  bucketParams,
  type ApiRequest,
  type RequestContent,
} from './api-request.js';

export {
  ApiRequestExecutor,
  type RequestExecutor,
  type ExecuteOptions,
  type RateLimitPolicy,
  type ExecutorConfig,
  type ApiRequestExecutorOptions,
} from './request-executor.js';

export { readText, sendOptionalRequest, sendRequest, parseJson, getJson } from './dispatch.js';
