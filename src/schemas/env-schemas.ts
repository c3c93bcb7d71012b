import { z } from 'zod';

// Environment overrides for chunk sizing; both are optional
export const ENV_SCHEMA = z.object({
  CHUNKWISE_MAX_SIZE: z.coerce.number().int().positive().optional(),
  CHUNKWISE_OVERLAP: z.coerce.number().int().nonnegative().optional(),
});

export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
