import { z } from 'zod';

export const QueryConfigSchema = z.object({
  protocol: z.enum(['graph', 'office']).default('graph'),
  defaultLimit: z.number().int().positive().optional(),
  warnOnUncommitted: z.boolean().default(true),
});

export type QueryConfig = z.infer<typeof QueryConfigSchema>;
export type ProtocolName = QueryConfig['protocol'];
