import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConstructionFailure } from '../hooks/errors.js';
import { createInfraConfig } from './infra-config.js';
import {
  InfraConfigParseError,
  deserializeInfraConfig,
  restoreInfraConfig,
  serializeInfraConfig,
} from './serialization.js';

const T0 = 1767225600;

function sampleConfig() {
  return createInfraConfig({
    instanceId: 'pc-instance-7',
    role: 'PARTNER',
    status: 'CREATED',
    gameType: 'ATTRIBUTION',
    numPidContainers: 1,
    numMpcContainers: 2,
    numFilesPerMpcContainer: 8,
    tier: 'rc',
    pceConfig: {
      subnets: ['subnet-a'],
      cluster: 'test-cluster',
      region: 'us-west-2',
      oneDockerTaskDefinition: 'task:1',
    },
  });
}

describe('InfraConfig serialization', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0 * 1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('restores an equal, ready instance', () => {
    const original = sampleConfig();
    vi.setSystemTime((T0 + 60) * 1000);
    original.updateStatus('ID_MATCHING_STARTED');

    const restored = deserializeInfraConfig(serializeInfraConfig(original));

    expect(restored.lifecycleState).toBe('READY');
    expect(restored.toJSON()).toEqual(original.toJSON());
  });

  it('round-trips an entity at the lowest values it accepts', () => {
    const minimal = createInfraConfig({
      instanceId: 'x',
      role: 'PUBLISHER',
      status: 'UNKNOWN',
      gameType: 'LIFT',
      numPidContainers: 1,
      numMpcContainers: 1,
      numFilesPerMpcContainer: 1,
      statusUpdateTs: 0,
      creationTs: 0,
      retryCounter: 0,
      endTs: 0,
      mpcComputeConcurrency: 1,
      instances: [{ kind: 'STAGE_STATE', instanceId: '', status: '' }],
    });

    const restored = deserializeInfraConfig(serializeInfraConfig(minimal));

    expect(restored.toJSON()).toEqual(minimal.toJSON());
    expect(restored.statusUpdates).toEqual([{ status: 'UNKNOWN', statusUpdateTs: 0 }]);
  });

  it('keeps the stored history rather than seeding a new one', () => {
    const original = sampleConfig();
    vi.setSystemTime((T0 + 300) * 1000);

    const restored = deserializeInfraConfig(serializeInfraConfig(original));

    expect(restored.statusUpdates).toEqual([{ status: 'CREATED', statusUpdateTs: T0 }]);
    expect(restored.get('creationTs')).toBe(T0);
  });

  it('keeps immutability after a restore', () => {
    const restored = deserializeInfraConfig(serializeInfraConfig(sampleConfig()));
    expect(restored.isWritable('tier')).toBe(false);
    expect(restored.isWritable('numMpcContainers')).toBe(true);
  });

  it('rejects malformed JSON', () => {
    expect(() => deserializeInfraConfig('{not json')).toThrow(InfraConfigParseError);
  });

  it('lists schema issues by path', () => {
    const payload = { ...sampleConfig().toJSON(), status: 'DONE', numMpcContainers: 0 };

    try {
      restoreInfraConfig(payload);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InfraConfigParseError);
      if (!(error instanceof InfraConfigParseError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^status: /);
      expect(error.issues[1]).toMatch(/^numMpcContainers: /);
    }
  });

  it('re-checks invariants on stored payloads', () => {
    const payload = { ...sampleConfig().toJSON(), numPidContainers: 3 };
    expect(() => restoreInfraConfig(payload)).toThrow(ConstructionFailure);
    expect(() => restoreInfraConfig(payload)).toThrow('(3 > 2)');
  });
});
