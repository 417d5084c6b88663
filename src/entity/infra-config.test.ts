import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConstructionFailure,
  DerivedFieldViolation,
  ImmutableFieldViolation,
  InvariantViolation,
} from '../hooks/errors.js';
import { CONTAINER_COUNT_HOOK_ID, createInfraConfig, infraConfigRegistry, type InfraConfigInit } from './infra-config.js';

const T0 = 1767225600; // 2026-01-01T00:00:00Z

function baseInit(overrides: Partial<InfraConfigInit> = {}): InfraConfigInit {
  return {
    instanceId: 'pc-instance-1',
    role: 'PUBLISHER',
    status: 'CREATED',
    gameType: 'LIFT',
    numPidContainers: 2,
    numMpcContainers: 5,
    numFilesPerMpcContainer: 4,
    ...overrides,
  };
}

describe('InfraConfig', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0 * 1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('construction', () => {
    it('applies defaults and seeds the status history', () => {
      const config = createInfraConfig(baseInit());

      expect(config.lifecycleState).toBe('READY');
      expect(config.toJSON()).toEqual({
        instanceId: 'pc-instance-1',
        role: 'PUBLISHER',
        status: 'CREATED',
        statusUpdateTs: T0,
        instances: [],
        gameType: 'LIFT',
        numPidContainers: 2,
        numMpcContainers: 5,
        numFilesPerMpcContainer: 4,
        statusUpdates: [{ status: 'CREATED', statusUpdateTs: T0 }],
        tier: null,
        pcsFeatures: [],
        pceConfig: null,
        stageFlowClsName: 'PrivateComputationStageFlow',
        retryCounter: 0,
        creationTs: T0,
        endTs: 0,
        mpcComputeConcurrency: 1,
      });
    });

    it('rejects more PID containers than MPC containers', () => {
      try {
        createInfraConfig(baseInit({ numPidContainers: 6, numMpcContainers: 5 }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConstructionFailure);
        if (!(error instanceof ConstructionFailure)) return;
        expect(error.violation).toBeInstanceOf(InvariantViolation);
        expect(error.violation).toMatchObject({
          hookId: CONTAINER_COUNT_HOOK_ID,
          fields: { numPidContainers: 6, numMpcContainers: 5 },
        });
      }
    });

    it('accepts equal container counts', () => {
      const config = createInfraConfig(baseInit({ numPidContainers: 5, numMpcContainers: 5 }));
      expect(config.get('numPidContainers')).toBe(5);
    });

    it('keeps a supplied history instead of seeding one', () => {
      const history = [
        { status: 'CREATED' as const, statusUpdateTs: T0 - 100 },
        { status: 'ID_MATCHING_STARTED' as const, statusUpdateTs: T0 - 50 },
      ];
      const config = createInfraConfig(
        baseInit({ status: 'ID_MATCHING_STARTED', statusUpdateTs: T0 - 50, statusUpdates: history })
      );
      expect(config.statusUpdates).toEqual(history);
    });

    it('deduplicates pcs features', () => {
      const config = createInfraConfig(baseInit({ pcsFeatures: ['pcs_private_lift', 'bolt', 'pcs_private_lift'] }));
      expect(config.get('pcsFeatures')).toEqual(['pcs_private_lift', 'bolt']);
    });

    it('rejects an empty instance id', () => {
      expect(() => createInfraConfig(baseInit({ instanceId: '' }))).toThrow(
        'Failed to construct InfraConfig: instanceId must be a non-empty string'
      );
    });

    it.each([
      ['numPidContainers', { numPidContainers: 0 }],
      ['numFilesPerMpcContainer', { numFilesPerMpcContainer: 0 }],
    ] as const)('rejects a zero %s', (field, overrides) => {
      expect(() => createInfraConfig(baseInit(overrides))).toThrow(
        `${field} must be an integer of at least 1 (got 0)`
      );
    });

    it('rejects negative and fractional timestamps', () => {
      expect(() => createInfraConfig(baseInit({ creationTs: -1 }))).toThrow('creationTs must be an integer');
      expect(() => createInfraConfig(baseInit({ statusUpdateTs: 1.5 }))).toThrow('statusUpdateTs must be an integer');
      expect(() => createInfraConfig(baseInit({ endTs: -5 }))).toThrow('endTs must be an integer of at least 0 (got -5)');
    });

    it('rejects a zero MPC compute concurrency', () => {
      expect(() => createInfraConfig(baseInit({ mpcComputeConcurrency: 0 }))).toThrow(
        'Failed to construct InfraConfig: mpcComputeConcurrency must be an integer of at least 1 (got 0)'
      );
    });
  });

  describe('container count invariant', () => {
    it('rejects raising numPidContainers above numMpcContainers and keeps the old value', () => {
      const config = createInfraConfig(baseInit());

      expect(() => config.set('numPidContainers', 6)).toThrow(InvariantViolation);
      expect(() => config.set('numPidContainers', 6)).toThrow(
        'numPidContainers must be less than or equal to numMpcContainers (6 > 5)'
      );
      expect(config.get('numPidContainers')).toBe(2);
    });

    it('rejects lowering numMpcContainers below numPidContainers', () => {
      const config = createInfraConfig(baseInit({ numPidContainers: 4 }));

      expect(() => config.set('numMpcContainers', 3)).toThrow('(4 > 3)');
      expect(config.get('numMpcContainers')).toBe(5);
    });

    it('rejects zero MPC containers before comparing counts', () => {
      const config = createInfraConfig(baseInit());
      expect(() => config.set('numMpcContainers', 0)).toThrow('numMpcContainers must be an integer of at least 1 (got 0)');
      expect(config.get('numMpcContainers')).toBe(5);
    });

    it('evaluates the check once per container write', () => {
      const config = createInfraConfig(baseInit());
      const report = config.set('numMpcContainers', 3);
      expect(report.evaluated).toEqual(['numMpcContainers-minimum', CONTAINER_COUNT_HOOK_ID]);
      expect(report.fired).toEqual([]);
    });
  });

  describe('status history', () => {
    it('stamps and records each status write', () => {
      const config = createInfraConfig(baseInit());
      const t1 = T0 + 90;
      vi.setSystemTime(t1 * 1000);

      config.updateStatus('ID_MATCHING_STARTED');

      expect(config.get('statusUpdateTs')).toBe(t1);
      expect(config.statusUpdates).toEqual([
        { status: 'CREATED', statusUpdateTs: T0 },
        { status: 'ID_MATCHING_STARTED', statusUpdateTs: t1 },
      ]);
    });

    it('grows by one non-decreasing entry per write', () => {
      const config = createInfraConfig(baseInit());
      const statuses = ['ID_MATCHING_STARTED', 'ID_MATCHING_COMPLETED', 'COMPUTATION_STARTED'] as const;

      statuses.forEach((status, i) => {
        vi.setSystemTime((T0 + i * 30) * 1000);
        config.updateStatus(status);
      });

      const history = config.statusUpdates;
      expect(history).toHaveLength(4);
      expect(history.map(h => h.statusUpdateTs)).toEqual([T0, T0, T0 + 30, T0 + 60]);
    });

    it('keeps stamps non-decreasing when the clock is behind the last entry', () => {
      vi.setSystemTime(1_000_000 * 1000);
      const config = createInfraConfig(baseInit({ statusUpdateTs: 2_000_000 }));

      config.updateStatus('ID_MATCHING_STARTED');

      expect(config.get('statusUpdateTs')).toBe(2_000_000);
      expect(config.statusUpdates).toEqual([
        { status: 'CREATED', statusUpdateTs: 2_000_000 },
        { status: 'ID_MATCHING_STARTED', statusUpdateTs: 2_000_000 },
      ]);
    });

    it('rejects a supplied history that goes back in time', () => {
      expect(() =>
        createInfraConfig(
          baseInit({
            status: 'ID_MATCHING_STARTED',
            statusUpdates: [
              { status: 'CREATED', statusUpdateTs: T0 },
              { status: 'ID_MATCHING_STARTED', statusUpdateTs: T0 - 10 },
            ],
          })
        )
      ).toThrow('statusUpdates[1] has timestamp 1767225590');
    });

    it('refuses direct writes to the history and its stamp', () => {
      const config = createInfraConfig(baseInit());
      vi.setSystemTime((T0 + 90) * 1000);
      config.updateStatus('ID_MATCHING_STARTED');
      const before = config.toJSON();

      expect(() => config.set('statusUpdates', [])).toThrow(DerivedFieldViolation);
      expect(() => config.set('statusUpdateTs', 0)).toThrow(
        'Field "statusUpdateTs" is maintained by hooks and cannot be written directly'
      );
      expect(config.statusUpdates).toHaveLength(2);
      expect(config.toJSON()).toEqual(before);
      expect(config.isWritable('statusUpdates')).toBe(false);
    });

    it('returns a copy of the history', () => {
      const config = createInfraConfig(baseInit());
      config.statusUpdates.push({ status: 'TIMEOUT', statusUpdateTs: 0 });
      expect(config.statusUpdates).toHaveLength(1);
    });
  });

  describe('immutable fields', () => {
    it('rejects rewriting instanceId, gameType and creationTs', () => {
      const config = createInfraConfig(baseInit());

      expect(() => config.set('instanceId', 'other')).toThrow(ImmutableFieldViolation);
      expect(() => config.set('gameType', 'ATTRIBUTION')).toThrow(ImmutableFieldViolation);
      expect(() => config.set('creationTs', 1)).toThrow(ImmutableFieldViolation);
      expect(config.instanceId).toBe('pc-instance-1');
      expect(config.get('gameType')).toBe('LIFT');
    });

    it('lets an unset tier be written exactly once', () => {
      const config = createInfraConfig(baseInit());

      config.set('tier', 'rc');
      expect(config.get('tier')).toBe('rc');
      expect(() => config.set('tier', 'latest')).toThrow(ImmutableFieldViolation);
      expect(config.get('tier')).toBe('rc');
    });
  });

  describe('other fields', () => {
    it('rejects a negative retry counter', () => {
      const config = createInfraConfig(baseInit());
      expect(() => config.set('retryCounter', -1)).toThrow('retryCounter must be an integer of at least 0 (got -1)');
      expect(config.get('retryCounter')).toBe(0);
    });

    it('appends stage instances', () => {
      const config = createInfraConfig(baseInit());
      config.addStageInstance({ kind: 'PID', instanceId: 'pid-1', status: 'STARTED' });
      expect(config.get('instances')).toEqual([{ kind: 'PID', instanceId: 'pid-1', status: 'STARTED' }]);
    });
  });

  it('declares its immutable fields', () => {
    expect(infraConfigRegistry.getImmutableFields()).toEqual(['instanceId', 'gameType', 'tier', 'creationTs']);
  });

  it('leaves the status stamp and history to hooks', () => {
    expect(infraConfigRegistry.getMutability('statusUpdateTs')).toBe('DERIVED');
    expect(infraConfigRegistry.getMutability('statusUpdates')).toBe('DERIVED');
  });
});
