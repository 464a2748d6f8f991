import { z } from 'zod';

export const TRACE_EVENTS = [
  'skill-start',
  'skill-complete',
  'spawn',
  'completion',
  'failure',
  'respawn',
] as const;

/** Events recorded by the lead itself rather than on behalf of an agent */
export const AGENTLESS_EVENTS: readonly TraceEvent[] = ['skill-start', 'skill-complete'];

export const TraceEventSchema = z.enum(TRACE_EVENTS);

export const TraceEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  sessionId: z.string().min(1),
  skill: z.string().min(1),
  event: TraceEventSchema,
  agent: z.string().optional(),
  role: z.string().optional(),
  payload: z.record(z.unknown()).default({}),
});

export const TRACE_REQUIRED_FIELDS = ['id', 'timestamp', 'sessionId', 'skill', 'event', 'payload'] as const;

export type TraceEvent = z.infer<typeof TraceEventSchema>;
export type TraceEntry = z.infer<typeof TraceEntrySchema>;

export interface TraceFilters {
  sessionId?: string;
  skill?: string;
  event?: string;
  agent?: string;
}
