/**
 * Autopilot state endpoint
 * @module renterd-client/autopilot/state
 */

import { z } from 'zod';
import { getJson, type RequestExecutor } from '../executor/index.js';
import { commonStateSchema, timestampSchema } from '../types/index.js';

export const autopilotStateSchema = commonStateSchema.extend({
  configured: z.boolean(),
  migrating: z.boolean(),
  migratingLastStart: timestampSchema,
  pruning: z.boolean(),
  pruningLastStart: timestampSchema,
  scanning: z.boolean(),
  scanningLastStart: timestampSchema,
  /** Milliseconds since the autopilot started */
  uptimeMs: z.number().int().nonnegative(),
});

export type AutopilotState = z.output<typeof autopilotStateSchema>;

export async function getAutopilotState(executor: RequestExecutor): Promise<AutopilotState> {
  return getJson(executor, 'autopilot/state', autopilotStateSchema);
}
