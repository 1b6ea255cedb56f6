/**
 * Worker api
 * @module renterd-client/worker
 */

import type { RequestExecutor } from '../executor/index.js';
import type { SeekableStreamOptions } from '../streaming/index.js';
import { WorkerMemory } from './memory.js';
import { WorkerObjects } from './objects.js';
import { getWorkerId, getWorkerState, type WorkerState } from './state.js';

export { DownloadableObject, type ObjectMetadata } from './downloadable-object.js';
export { WorkerMemory, memorySchema, type Memory, type MemoryStatus } from './memory.js';
export {
  WorkerObjects,
  deleteRequest,
  downloadHeadRequest,
  parseObjectMetadata,
  uploadRequest,
  type DeleteOptions,
  type DownloadOptions,
  type UploadOptions,
} from './objects.js';
export { getWorkerId, getWorkerState, workerStateSchema, type WorkerState } from './state.js';

/**
 * Worker endpoints
 *
 * @example
 * ```typescript
 * const id = await client.worker.id();
 * const { download } = await client.worker.memory.list();
 * ```
 */
export class Worker {
  readonly memory: WorkerMemory;
  readonly objects: WorkerObjects;
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor, streamOptions: SeekableStreamOptions = {}) {
    this.executor = executor;
    this.memory = new WorkerMemory(executor);
    this.objects = new WorkerObjects(executor, streamOptions);
  }

  /**
   * Identifier the worker was started with
   */
  id(): Promise<string> {
    return getWorkerId(this.executor);
  }

  state(): Promise<WorkerState> {
    return getWorkerState(this.executor);
  }
}
