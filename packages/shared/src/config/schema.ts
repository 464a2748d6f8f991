import { z } from 'zod';

export const PlanLimitsConfigSchema = z
  .object({
    /** Soft ceiling on node count; exceeding it is a warning */
    maxNodes: z.number().int().positive().default(12),
    /** Soft ceiling on critical-path depth in waves */
    maxDepth: z.number().int().positive().default(8),
    /** A failed node may be retried while attempts stay below this */
    maxAttempts: z.number().int().positive().default(3),
    maxRepairPasses: z.number().int().min(1).default(2),
  })
  .default({});

export const BreakerConfigSchema = z
  .object({
    threshold: z.number().gt(0).lt(1).default(0.5),
    /** Plans with at most this many nodes never trip the breaker */
    exemptMaxNodes: z.number().int().nonnegative().default(3),
  })
  .default({});

export const MemoryConfigSchema = z
  .object({
    topK: z.number().int().positive().default(5),
    defaultImportance: z.number().int().min(1).max(10).default(5),
    /** Multiplier applied per 30 days of age */
    recencyDecayPerMonth: z.number().gt(0).lt(1).default(0.9),
  })
  .default({});

export const ReflectionConfigSchema = z
  .object({
    healthWindow: z.number().int().positive().default(5),
    maxImprovements: z.number().int().positive().default(10),
  })
  .default({});

export const WorkspaceConfigSchema = z
  .object({
    /** Directory holding plan.json and the logs, relative to the working directory */
    dir: z.string().min(1).default('.design'),
  })
  .default({});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  workspace: WorkspaceConfigSchema,
  plan: PlanLimitsConfigSchema,
  breaker: BreakerConfigSchema,
  memory: MemoryConfigSchema,
  reflection: ReflectionConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type PlanLimitsConfig = z.infer<typeof PlanLimitsConfigSchema>;
export type BreakerConfig = z.infer<typeof BreakerConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type ReflectionConfig = z.infer<typeof ReflectionConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
