/**
 * Status handling and body decoding shared by the endpoint wrappers
 * @module renterd-client/executor/dispatch
 */

import type { z } from 'zod';
import { NotFoundError, ProtocolError, mapHttpStatusToError } from '../errors/index.js';
import { collectBytes, type HttpResponse } from '../transport/index.js';
import { ApiRequestBuilder, type ApiRequest } from './api-request.js';
import type { ExecuteOptions, RequestExecutor } from './request-executor.js';

/**
 * Reads the whole response body as UTF-8 text
 */
export async function readText(response: HttpResponse, signal?: AbortSignal): Promise<string> {
  const bytes = await collectBytes(response.body, signal);
  return new TextDecoder('utf-8').decode(bytes);
}

/**
 * Sends a request and checks its status.
 *
 * @returns The response, or `null` when the server answered 404
 * @throws {AuthError} On 401
 * @throws {HttpResponseError} On any other 4xx/5xx status
 */
export async function sendOptionalRequest(
  executor: RequestExecutor,
  request: ApiRequest,
  options?: ExecuteOptions
): Promise<HttpResponse | null> {
  const response = await executor.execute(request, options);

  if (response.status === 404) {
    response.body.cancel();
    return null;
  }

  if (response.status >= 400) {
    const text = (await readText(response, options?.signal)).trim();
    throw mapHttpStatusToError(response.status, text, request.path);
  }

  return response;
}

/**
 * Like {@link sendOptionalRequest}, but a 404 becomes a NotFoundError
 */
export async function sendRequest(
  executor: RequestExecutor,
  request: ApiRequest,
  options?: ExecuteOptions
): Promise<HttpResponse> {
  const response = await sendOptionalRequest(executor, request, options);
  if (response === null) {
    throw NotFoundError.resource(request.path);
  }
  return response;
}

/**
 * Parses a JSON body against a schema
 *
 * @throws {ProtocolError} INVALID_DATA when the body is not valid for `schema`
 */
export function parseJson<T extends z.ZodTypeAny>(text: string, schema: T): z.output<T> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw ProtocolError.invalidData(error instanceof Error ? error.message : 'malformed json', error);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw ProtocolError.invalidData(`${where}${issue?.message ?? 'unexpected shape'}`, result.error);
  }
  return result.data;
}

/**
 * GETs an endpoint and decodes its JSON body
 */
export async function getJson<T extends z.ZodTypeAny>(
  executor: RequestExecutor,
  path: string,
  schema: T,
  params?: ReadonlyArray<readonly [string, string]>
): Promise<z.output<T>> {
  const response = await sendRequest(executor, ApiRequestBuilder.get(path).params(params).build());
  return parseJson(await readText(response), schema);
}
