/**
 * State fields shared by the bus, worker and autopilot
 * @module renterd-client/types/state
 */

import { z } from 'zod';

/**
 * RFC 3339 timestamp decoded into a Date
 */
export const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value, ctx) => {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp ${value}` });
      return z.NEVER;
    }
    return date;
  });

export const commonStateSchema = z.object({
  startTime: timestampSchema,
  network: z.string(),
  version: z.string(),
  commit: z.string(),
  os: z.string(),
  buildTime: timestampSchema,
});

/**
 * Build and runtime information every daemon component reports
 */
export type CommonState = z.output<typeof commonStateSchema>;
