/**
 * Bus api
 * @module renterd-client/bus
 */

import type { RequestExecutor } from '../executor/index.js';
import { getBusState, type BusState } from './state.js';

export { busStateSchema, getBusState, type BusState } from './state.js';

/**
 * Bus endpoints
 */
export class Bus {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  /**
   * Build and runtime information of the bus
   */
  state(): Promise<BusState> {
    return getBusState(this.executor);
  }
}
