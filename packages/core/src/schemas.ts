/**
 * Validation schemas for targets and persisted records
 */

import { z } from 'zod';

// ============================================================================
// Primitives
// ============================================================================

export const TARGET_ID_PATTERN = /^[a-z0-9][a-z0-9_-]{0,62}$/i;

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export const TargetIdSchema = z
  .string()
  .regex(TARGET_ID_PATTERN, 'id must be 1-63 letters, digits, "-" or "_" and start with a letter or digit');

export const HttpUrlSchema = z
  .string()
  .refine(isHttpUrl, { message: 'must be an http:// or https:// URL' });

export const ProviderKindSchema = z.enum(['RENDER', 'KOYEB', 'WEBHOOK']);

const IntervalSecondsSchema = z.number().positive('intervalSeconds must be greater than 0');
const FailureThresholdSchema = z.number().int().min(1, 'failureThreshold must be at least 1');
const CooldownSecondsSchema = z.number().min(0, 'cooldownSeconds must not be negative');
const TimeoutMsSchema = z.number().int().positive();
const DescriptionSchema = z.string().max(500);

// ============================================================================
// Provider Deploy Schemas
// ============================================================================

export const RenderDeployConfigSchema = z
  .object({
    deployHookUrl: HttpUrlSchema.optional(),
    serviceId: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
  })
  .refine((config) => config.deployHookUrl !== undefined || config.serviceId !== undefined, {
    message: 'RENDER deploy config needs deployHookUrl or serviceId',
  });

export const KoyebDeployConfigSchema = z.object({
  serviceId: z.string().min(1),
  apiToken: z.string().min(1).optional(),
});

export const WebhookDeployConfigSchema = z.object({
  url: HttpUrlSchema,
  method: z.enum(['GET', 'POST']).default('GET'),
  headers: z.record(z.string()).optional(),
});

// ============================================================================
// Target Schemas
// ============================================================================

const TargetFieldsShape = {
  id: TargetIdSchema,
  url: HttpUrlSchema,
  intervalSeconds: IntervalSecondsSchema.default(300),
  failureThreshold: FailureThresholdSchema.default(3),
  cooldownSeconds: CooldownSecondsSchema.default(300),
  timeoutMs: TimeoutMsSchema.optional(),
  enabled: z.boolean().default(true),
  autoRedeploy: z.boolean().default(true),
  allowManualRedeploy: z.boolean().default(true),
  description: DescriptionSchema.optional(),
};

export const CreateTargetSchema = z.discriminatedUnion('provider', [
  z.object({
    ...TargetFieldsShape,
    provider: z.literal('RENDER'),
    deploy: RenderDeployConfigSchema,
  }),
  z.object({
    ...TargetFieldsShape,
    provider: z.literal('KOYEB'),
    deploy: KoyebDeployConfigSchema,
  }),
  z.object({
    ...TargetFieldsShape,
    provider: z.literal('WEBHOOK'),
    deploy: WebhookDeployConfigSchema,
  }),
]);

/**
 * Partial update; `null` clears an optional field. The id is not updatable.
 */
export const UpdateTargetSchema = z
  .object({
    url: HttpUrlSchema.optional(),
    intervalSeconds: IntervalSecondsSchema.optional(),
    failureThreshold: FailureThresholdSchema.optional(),
    cooldownSeconds: CooldownSecondsSchema.optional(),
    timeoutMs: TimeoutMsSchema.nullable().optional(),
    enabled: z.boolean().optional(),
    autoRedeploy: z.boolean().optional(),
    allowManualRedeploy: z.boolean().optional(),
    description: DescriptionSchema.nullable().optional(),
    provider: ProviderKindSchema.optional(),
    deploy: z.record(z.unknown()).optional(),
  })
  .strict();

export type CreateTargetRequest = z.input<typeof CreateTargetSchema>;
export type TargetDefinition = z.output<typeof CreateTargetSchema>;
export type UpdateTargetRequest = z.input<typeof UpdateTargetSchema>;
export type TargetUpdate = z.output<typeof UpdateTargetSchema>;

// ============================================================================
// Persisted Records
// ============================================================================

export const TargetTimestampsSchema = z.object({
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const StoredTargetRecordSchema = z.object({
  seq: z.number().int().nonnegative(),
  target: z.record(z.unknown()),
});

export const RedeployOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('SUCCEEDED') }),
  z.object({ kind: z.literal('FAILED'), reason: z.string() }),
  z.object({ kind: z.literal('THROTTLED'), reason: z.string() }),
]);

export const RedeployAttemptSchema = z.object({
  id: z.string(),
  targetId: z.string(),
  trigger: z.enum(['AUTOMATIC', 'MANUAL']),
  requestedAt: z.string(),
  completedAt: z.string(),
  outcome: RedeployOutcomeSchema,
});

export const RedeployHistorySchema = z.array(RedeployAttemptSchema);

// ============================================================================
// API Payloads
// ============================================================================

export const TargetSchema = CreateTargetSchema.and(TargetTimestampsSchema);

export const HealthStatusSchema = z.enum(['UNKNOWN', 'HEALTHY', 'DEGRADED', 'DOWN', 'REDEPLOYING']);

export const ProbeOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('SUCCESS'), statusCode: z.number().int() }),
  z.object({ kind: z.literal('TIMEOUT') }),
  z.object({ kind: z.literal('CONNECTION_ERROR'), message: z.string() }),
  z.object({ kind: z.literal('HTTP_ERROR'), statusCode: z.number().int() }),
]);

export const ProbeResultSchema = z.object({
  targetId: z.string(),
  timestamp: z.string(),
  outcome: ProbeOutcomeSchema,
  latencyMs: z.number(),
});

export const HealthStateSchema = z.object({
  status: HealthStatusSchema,
  consecutiveFailures: z.number().int().nonnegative(),
  lastTransitionAt: z.string().nullable(),
  lastRedeployAt: z.string().nullable(),
  lastProbe: ProbeResultSchema.nullable(),
});

export const TargetViewSchema = z.object({
  target: TargetSchema,
  health: HealthStateSchema,
});

export const TargetDetailSchema = TargetViewSchema.extend({
  history: RedeployHistorySchema,
});

export const ProbeResponseSchema = z.object({
  result: ProbeResultSchema,
  health: HealthStateSchema,
});
