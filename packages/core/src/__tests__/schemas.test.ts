/**
 * Tests for target validation schemas
 */

import { describe, it, expect } from 'vitest';
import {
  CreateTargetSchema,
  UpdateTargetSchema,
  TargetIdSchema,
  HttpUrlSchema,
  RedeployHistorySchema,
  TargetViewSchema,
} from '../schemas.js';

const webhookTarget = {
  id: 'api',
  url: 'https://api.example.com/health',
  provider: 'WEBHOOK',
  deploy: { url: 'https://hooks.example.com/deploy' },
};

describe('Target Schemas', () => {
  describe('TargetIdSchema', () => {
    it.each(['api', 'API-1', 'a', 'bot_42', 'x'.repeat(63)])('should accept %s', (id) => {
      expect(TargetIdSchema.safeParse(id).success).toBe(true);
    });

    it.each(['', '-api', 'has space', 'slash/id', 'x'.repeat(64)])('should reject %s', (id) => {
      expect(TargetIdSchema.safeParse(id).success).toBe(false);
    });
  });

  describe('HttpUrlSchema', () => {
    it('should accept http and https URLs', () => {
      expect(HttpUrlSchema.safeParse('http://localhost:8080/ping').success).toBe(true);
      expect(HttpUrlSchema.safeParse('https://svc.onrender.com').success).toBe(true);
    });

    it('should reject other protocols and garbage', () => {
      expect(HttpUrlSchema.safeParse('ftp://files.example.com').success).toBe(false);
      expect(HttpUrlSchema.safeParse('not a url').success).toBe(false);
    });
  });

  describe('CreateTargetSchema', () => {
    it('should fill defaults', () => {
      const parsed = CreateTargetSchema.parse(webhookTarget);

      expect(parsed).toEqual({
        id: 'api',
        url: 'https://api.example.com/health',
        provider: 'WEBHOOK',
        deploy: { url: 'https://hooks.example.com/deploy', method: 'GET' },
        intervalSeconds: 300,
        failureThreshold: 3,
        cooldownSeconds: 300,
        enabled: true,
        autoRedeploy: true,
        allowManualRedeploy: true,
      });
    });

    it('should accept a Render deploy hook or service id', () => {
      const hook = CreateTargetSchema.safeParse({
        ...webhookTarget,
        provider: 'RENDER',
        deploy: { deployHookUrl: 'https://api.render.com/deploy/srv-abc?key=test-secret' },
      });
      const service = CreateTargetSchema.safeParse({
        ...webhookTarget,
        provider: 'RENDER',
        deploy: { serviceId: 'srv-abc' },
      });

      expect(hook.success).toBe(true);
      expect(service.success).toBe(true);
    });

    it('should reject a Render config with neither hook nor service id', () => {
      const result = CreateTargetSchema.safeParse({ ...webhookTarget, provider: 'RENDER', deploy: {} });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.issues[0]?.message).toBe('RENDER deploy config needs deployHookUrl or serviceId');
    });

    it('should require a Koyeb service id', () => {
      const result = CreateTargetSchema.safeParse({ ...webhookTarget, provider: 'KOYEB', deploy: {} });

      expect(result.success).toBe(false);
    });

    it.each([
      ['intervalSeconds', 0],
      ['intervalSeconds', -5],
      ['failureThreshold', 0],
      ['failureThreshold', 1.5],
      ['cooldownSeconds', -1],
    ])('should reject %s=%s', (field, value) => {
      expect(CreateTargetSchema.safeParse({ ...webhookTarget, [field]: value }).success).toBe(false);
    });

    it('should reject an unknown provider', () => {
      expect(CreateTargetSchema.safeParse({ ...webhookTarget, provider: 'HEROKU' }).success).toBe(false);
    });
  });

  describe('UpdateTargetSchema', () => {
    it('should accept partial fields and nulls for optional ones', () => {
      const parsed = UpdateTargetSchema.parse({ intervalSeconds: 60, timeoutMs: null });

      expect(parsed).toEqual({ intervalSeconds: 60, timeoutMs: null });
    });

    it('should refuse to change the id', () => {
      expect(UpdateTargetSchema.safeParse({ id: 'other' }).success).toBe(false);
    });

    it('should validate thresholds', () => {
      expect(UpdateTargetSchema.safeParse({ failureThreshold: 0 }).success).toBe(false);
    });
  });

  describe('RedeployHistorySchema', () => {
    it('should parse persisted attempts', () => {
      const history = [
        {
          id: 'a1',
          targetId: 'api',
          trigger: 'AUTOMATIC',
          requestedAt: '2026-01-01T00:00:00.000Z',
          completedAt: '2026-01-01T00:00:02.000Z',
          outcome: { kind: 'FAILED', reason: 'HTTP 500' },
        },
      ];

      expect(RedeployHistorySchema.parse(history)).toEqual(history);
    });

    it('should reject unknown outcomes', () => {
      const result = RedeployHistorySchema.safeParse([
        {
          id: 'a1',
          targetId: 'api',
          trigger: 'MANUAL',
          requestedAt: '2026-01-01T00:00:00.000Z',
          completedAt: '2026-01-01T00:00:02.000Z',
          outcome: { kind: 'MAYBE' },
        },
      ]);

      expect(result.success).toBe(false);
    });
  });

  describe('TargetViewSchema', () => {
    it('should accept a target as the API returns it', () => {
      const view = {
        target: {
          ...webhookTarget,
          intervalSeconds: 300,
          failureThreshold: 3,
          cooldownSeconds: 300,
          enabled: true,
          autoRedeploy: true,
          allowManualRedeploy: true,
          deploy: { url: 'https://hooks.example.com/deploy', method: 'GET' },
          createdAt: '2026-01-01T00:00:00.000Z',
          updatedAt: '2026-01-01T00:00:00.000Z',
        },
        health: {
          status: 'DOWN',
          consecutiveFailures: 3,
          lastTransitionAt: '2026-01-01T00:01:00.000Z',
          lastRedeployAt: null,
          lastProbe: {
            targetId: 'api',
            timestamp: '2026-01-01T00:01:00.000Z',
            outcome: { kind: 'HTTP_ERROR', statusCode: 503 },
            latencyMs: 42,
          },
        },
      };

      expect(TargetViewSchema.parse(view)).toEqual(view);
    });

    it('should reject an unknown status', () => {
      const result = TargetViewSchema.safeParse({
        target: { ...webhookTarget, createdAt: 'x', updatedAt: 'y' },
        health: {
          status: 'ASLEEP',
          consecutiveFailures: 0,
          lastTransitionAt: null,
          lastRedeployAt: null,
          lastProbe: null,
        },
      });

      expect(result.success).toBe(false);
    });
  });
});
