import { describe, it, expect } from 'vitest';
import { ConfigSchema, DEFAULT_CONFIG } from './schema';

describe('ConfigSchema', () => {
  it('fills every default from an empty object', () => {
    expect(DEFAULT_CONFIG).toEqual({
      configVersion: 1,
      logLevel: 'warn',
      workspace: { dir: '.design' },
      plan: { maxNodes: 12, maxDepth: 8, maxAttempts: 3, maxRepairPasses: 2 },
      breaker: { threshold: 0.5, exemptMaxNodes: 3 },
      memory: { topK: 5, defaultImportance: 5, recencyDecayPerMonth: 0.9 },
      reflection: { healthWindow: 5, maxImprovements: 10 },
    });
  });

  it('keeps sibling defaults when one field is set', () => {
    const config = ConfigSchema.parse({ plan: { maxNodes: 20 } });
    expect(config.plan).toEqual({ maxNodes: 20, maxDepth: 8, maxAttempts: 3, maxRepairPasses: 2 });
  });

  it('rejects out-of-range values', () => {
    expect(ConfigSchema.safeParse({ breaker: { threshold: 1.5 } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ memory: { defaultImportance: 11 } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ logLevel: 'loud' }).success).toBe(false);
  });
});
