/**
 * ConsentService Unit Tests
 * Versioning, lifecycle and validation of user -> agent consents
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  MAX_VERSION_ATTEMPTS,
  allowsAllScopes,
  allowsScope,
  allowsSensitivity,
  createConsentService,
  validateConsentGrant,
  type ConsentService,
  type ConsentServiceDb,
} from '@/services/consent.service.js';
import type { CreateConsentParams } from '@/types/index.js';

import { createTestActor, TEST_AGENT_ID, TEST_USER_ID } from '../../helpers/test-utils.js';
import { createInMemoryConsentDb, type InMemoryConsentDb } from '../../mocks/index.js';

const GRANT: CreateConsentParams = {
  userId: TEST_USER_ID,
  agentIdentifier: TEST_AGENT_ID,
  scopes: ['memory.read', 'memory.search'],
  sensitivityLevels: ['public', 'confidential'],
};

describe('ConsentService', () => {
  let db: InMemoryConsentDb;
  let publish: ReturnType<typeof vi.fn>;
  let service: ConsentService;
  const actor = createTestActor();

  beforeEach(() => {
    db = createInMemoryConsentDb();
    publish = vi.fn();
    service = createConsentService({ db, events: { publish } });
  });

  // ─────────────────────────────────────────────────────────────
  // CREATE
  // ─────────────────────────────────────────────────────────────

  describe('createConsent', () => {
    it('should create a pending consent at version 1', async () => {
      const result = await service.createConsent(actor, GRANT);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({
          userId: TEST_USER_ID,
          agentIdentifier: TEST_AGENT_ID,
          scopes: ['memory.read', 'memory.search'],
          sensitivityLevels: ['public', 'confidential'],
          status: 'pending',
          version: 1,
          revokedAt: null,
        });
      }
    });

    it('should give each new consent for the pair the next version', async () => {
      await service.createConsent(actor, GRANT);
      await service.createConsent(actor, GRANT);
      const third = await service.createConsent(actor, GRANT);

      expect(third.success && third.data.version).toBe(3);
    });

    it('should version each agent separately', async () => {
      await service.createConsent(actor, GRANT);
      const other = await service.createConsent(actor, {
        ...GRANT,
        agentIdentifier: 'agent-beta',
      });

      expect(other.success && other.data.version).toBe(1);
    });

    it('should hand out distinct versions to concurrent grants', async () => {
      const results = await Promise.all([
        service.createConsent(actor, GRANT),
        service.createConsent(actor, GRANT),
      ]);

      const versions = results.map((result) =>
        result.success ? result.data.version : null
      );
      expect(versions).toEqual([1, 2]);
      expect(db.rows.size).toBe(2);
    });

    it('should drop duplicate scopes and levels', async () => {
      const result = await service.createConsent(actor, {
        ...GRANT,
        scopes: ['memory.read', 'memory.read'],
        sensitivityLevels: ['public', 'public'],
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.scopes).toEqual(['memory.read']);
        expect(result.data.sensitivityLevels).toEqual(['public']);
      }
    });

    it('should publish consent.created after storing', async () => {
      const result = await service.createConsent(actor, GRANT);

      expect(publish).toHaveBeenCalledTimes(1);
      expect(publish).toHaveBeenCalledWith('consent.created', actor, {
        consentId: result.success ? result.data.id : -1,
        userId: TEST_USER_ID,
        agentIdentifier: TEST_AGENT_ID,
        version: 1,
        status: 'pending',
        scopes: ['memory.read', 'memory.search'],
        sensitivityLevels: ['public', 'confidential'],
        revokedAt: null,
      });
    });

    it('should reject unknown scopes without storing anything', async () => {
      const result = await service.createConsent(actor, {
        ...GRANT,
        scopes: ['memory.read', 'memory.admin'],
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Unsupported scopes requested',
          details: { scopes: ['memory.admin'] },
        },
      });
      expect(db.rows.size).toBe(0);
      expect(publish).not.toHaveBeenCalled();
    });

    it('should reject unknown sensitivity levels', async () => {
      const result = await service.createConsent(actor, {
        ...GRANT,
        sensitivityLevels: ['restricted'],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details).toEqual({ sensitivityLevels: ['restricted'] });
      }
    });

    it('should reject a blank user or agent', async () => {
      const noUser = await service.createConsent(actor, { ...GRANT, userId: ' ' });
      const noAgent = await service.createConsent(actor, {
        ...GRANT,
        agentIdentifier: '',
      });

      expect(!noUser.success && noUser.error.message).toBe('User ID is required');
      expect(!noAgent.success && noAgent.error.message).toBe(
        'Agent identifier is required'
      );
    });

    it('should give up with CONFLICT after repeated version collisions', async () => {
      const insertConsent = vi.fn().mockResolvedValue(null);
      const crowded: ConsentServiceDb = { ...db, insertConsent };
      const crowdedService = createConsentService({ db: crowded, events: { publish } });

      const result = await crowdedService.createConsent(actor, GRANT);

      expect(!result.success && result.error.code).toBe('CONFLICT');
      expect(insertConsent).toHaveBeenCalledTimes(MAX_VERSION_ATTEMPTS);
    });

    it('should report a storage failure as INTERNAL_ERROR', async () => {
      const broken: ConsentServiceDb = {
        ...db,
        getLatestVersion: vi.fn().mockRejectedValue(new Error('connection reset')),
      };
      const brokenService = createConsentService({ db: broken, events: { publish } });

      const result = await brokenService.createConsent(actor, GRANT);

      expect(result).toEqual({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'Failed to create consent' },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  describe('grantConsent', () => {
    it('should create and activate in one step', async () => {
      const result = await service.grantConsent(actor, GRANT);

      expect(result.success && result.data.status).toBe('active');
      const active = await service.findActiveConsent(TEST_USER_ID, TEST_AGENT_ID);
      expect(active?.version).toBe(1);
    });

    it('should publish consent.created then consent.activated', async () => {
      await service.grantConsent(actor, GRANT);

      expect(publish.mock.calls.map((call) => call[0])).toEqual([
        'consent.created',
        'consent.activated',
      ]);
      expect(publish.mock.calls[1]?.[2]).toMatchObject({ status: 'active', version: 1 });
    });
  });

  describe('findActiveConsent', () => {
    it('should prefer the highest active version', async () => {
      await service.grantConsent(actor, GRANT);
      await service.grantConsent(actor, { ...GRANT, scopes: ['memory.write'] });

      const active = await service.findActiveConsent(TEST_USER_ID, TEST_AGENT_ID);
      expect(active?.version).toBe(2);
      expect(active?.scopes).toEqual(['memory.write']);
    });

    it('should ignore pending consents', async () => {
      await service.createConsent(actor, GRANT);

      expect(await service.findActiveConsent(TEST_USER_ID, TEST_AGENT_ID)).toBeNull();
    });
  });

  describe('revokeConsent', () => {
    it('should revoke and publish consent.revoked', async () => {
      const granted = await service.grantConsent(actor, GRANT);
      if (!granted.success) throw new Error('grant failed');
      publish.mockClear();

      const result = await service.revokeConsent(actor, granted.data);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.status).toBe('revoked');
        expect(result.data.revokedAt).toBeInstanceOf(Date);
      }
      expect(publish).toHaveBeenCalledTimes(1);
      expect(publish.mock.calls[0]?.[0]).toBe('consent.revoked');
      expect(await service.findActiveConsent(TEST_USER_ID, TEST_AGENT_ID)).toBeNull();
    });

    it('should be idempotent and keep the first revokedAt', async () => {
      const granted = await service.grantConsent(actor, GRANT);
      if (!granted.success) throw new Error('grant failed');

      const first = await service.revokeConsent(actor, granted.data);
      // stale copy still says active
      const second = await service.revokeConsent(actor, granted.data);
      if (!first.success || !second.success) throw new Error('revoke failed');
      const third = await service.revokeConsent(actor, second.data);

      expect(second.data.revokedAt).toEqual(first.data.revokedAt);
      expect(third.success && third.data.revokedAt).toEqual(first.data.revokedAt);
      expect(
        publish.mock.calls.filter((call) => call[0] === 'consent.revoked')
      ).toHaveLength(1);
    });

    it('should publish once when two revokes race', async () => {
      const granted = await service.grantConsent(actor, GRANT);
      if (!granted.success) throw new Error('grant failed');
      publish.mockClear();

      const [first, second] = await Promise.all([
        service.revokeConsent(actor, granted.data),
        service.revokeConsent(actor, granted.data),
      ]);
      if (!first.success || !second.success) throw new Error('revoke failed');

      expect(first.data.status).toBe('revoked');
      expect(second.data.status).toBe('revoked');
      expect(second.data.revokedAt).toEqual(first.data.revokedAt);
      expect(publish).toHaveBeenCalledTimes(1);
    });

    it('should return NOT_FOUND for a consent that does not exist', async () => {
      const granted = await service.grantConsent(actor, GRANT);
      if (!granted.success) throw new Error('grant failed');
      db.rows.clear();

      const result = await service.revokeConsent(actor, granted.data);
      expect(!result.success && result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('getConsent', () => {
    it('should load by id', async () => {
      const created = await service.createConsent(actor, GRANT);
      if (!created.success) throw new Error('create failed');

      const loaded = await service.getConsent(created.data.id);
      expect(loaded).toEqual({ success: true, data: created.data });
    });

    it('should return NOT_FOUND for an unknown id', async () => {
      const loaded = await service.getConsent(999);
      expect(loaded).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Consent not found' },
      });
    });
  });
});

// ─────────────────────────────────────────────────────────────
// PREDICATES
// ─────────────────────────────────────────────────────────────

describe('consent predicates', () => {
  const consent = {
    id: 1,
    userId: TEST_USER_ID,
    agentIdentifier: TEST_AGENT_ID,
    scopes: ['memory.read' as const, 'memory.search' as const],
    sensitivityLevels: ['public' as const],
    status: 'active' as const,
    version: 1,
    createdAt: new Date(0),
    updatedAt: new Date(0),
    revokedAt: null,
  };

  it('allowsScope should check a single scope', () => {
    expect(allowsScope(consent, 'memory.read')).toBe(true);
    expect(allowsScope(consent, 'memory.write')).toBe(false);
  });

  it('allowsAllScopes should require every scope', () => {
    expect(allowsAllScopes(consent, ['memory.read', 'memory.search'])).toBe(true);
    expect(allowsAllScopes(consent, ['memory.read', 'memory.write'])).toBe(false);
    expect(allowsAllScopes(consent, [])).toBe(true);
  });

  it('allowsSensitivity should check granted levels', () => {
    expect(allowsSensitivity(consent, 'public')).toBe(true);
    expect(allowsSensitivity(consent, 'secret')).toBe(false);
  });

  it('validateConsentGrant should require at least one scope and level', () => {
    const noScopes = validateConsentGrant([], ['public']);
    const noLevels = validateConsentGrant(['memory.read'], []);

    expect(!noScopes.success && noScopes.error.message).toBe(
      'At least one scope must be granted'
    );
    expect(!noLevels.success && noLevels.error.message).toBe(
      'At least one sensitivity level must be granted'
    );
  });
});
