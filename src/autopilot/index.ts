/**
 * Autopilot api
 * @module renterd-client/autopilot
 */

import type { RequestExecutor } from '../executor/index.js';
import { getAutopilotState, type AutopilotState } from './state.js';

export { autopilotStateSchema, getAutopilotState, type AutopilotState } from './state.js';

export class Autopilot {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  /**
   * Current autopilot activity, including the last start of each background loop
   */
  state(): Promise<AutopilotState> {
    return getAutopilotState(this.executor);
  }
}
