/**
 * Shared api types
 */

export { timestampSchema, commonStateSchema, type CommonState } from './state.js';
