/**
 * Bus state endpoint
 * @module renterd-client/bus/state
 */

import type { z } from 'zod';
import { getJson, type RequestExecutor } from '../executor/index.js';
import { commonStateSchema } from '../types/index.js';

export const busStateSchema = commonStateSchema;

export type BusState = z.output<typeof busStateSchema>;

/**
 * Fetches `bus/state`
 */
export async function getBusState(executor: RequestExecutor): Promise<BusState> {
  return getJson(executor, 'bus/state', busStateSchema);
}
