/**
 * Worker identity and state endpoints
 * @module renterd-client/worker/state
 */

import { z } from 'zod';
import { getJson, type RequestExecutor } from '../executor/index.js';
import { commonStateSchema } from '../types/index.js';

export const workerStateSchema = commonStateSchema.extend({
  id: z.string(),
});

export type WorkerState = z.output<typeof workerStateSchema>;

export async function getWorkerId(executor: RequestExecutor): Promise<string> {
  return getJson(executor, 'worker/id', z.string());
}

export async function getWorkerState(executor: RequestExecutor): Promise<WorkerState> {
  return getJson(executor, 'worker/state', workerStateSchema);
}
