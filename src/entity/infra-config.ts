import { createGenericHook, createUpdateHook } from '../hooks/hook.js';
import { InvariantViolation } from '../hooks/errors.js';
import { FieldRegistry } from '../hooks/registry.js';
import type { FieldReader, HookScope } from '../hooks/types.js';
import { isPresent } from '../mutability/enforcer.js';
import { GovernedEntity } from './governed-entity.js';
import { currentEpochSeconds, type InstanceStatus, type StatusUpdate } from './status.js';

export type PrivateComputationRole = 'PUBLISHER' | 'PARTNER';

export type PrivateComputationGameType = 'LIFT' | 'ATTRIBUTION';

export type StageInstanceKind = 'PID' | 'MPC' | 'POST_PROCESSING' | 'STAGE_STATE';

/** Record of a stage instance started on behalf of the computation. */
export interface StageInstanceRecord {
  kind: StageInstanceKind;
  instanceId: string;
  status: string;
}

export interface PceConfig {
  subnets: string[];
  cluster: string;
  region: string;
  oneDockerTaskDefinition: string;
}

export interface InfraConfigFields {
  instanceId: string;
  role: PrivateComputationRole;
  status: InstanceStatus;
  statusUpdateTs: number;
  instances: StageInstanceRecord[];
  gameType: PrivateComputationGameType;
  numPidContainers: number;
  numMpcContainers: number;
  numFilesPerMpcContainer: number;
  statusUpdates: StatusUpdate[];
  /** Release binary tier (rc, canary, latest); may be set once. */
  tier: string | null;
  pcsFeatures: string[];
  pceConfig: PceConfig | null;
  stageFlowClsName: string;
  retryCounter: number;
  creationTs: number;
  endTs: number;
  mpcComputeConcurrency: number;
}

export type InfraConfigInit = Pick<
  InfraConfigFields,
  | 'instanceId'
  | 'role'
  | 'status'
  | 'gameType'
  | 'numPidContainers'
  | 'numMpcContainers'
  | 'numFilesPerMpcContainer'
> &
  Partial<InfraConfigFields>;

export const DEFAULT_STAGE_FLOW_CLS_NAME = 'PrivateComputationStageFlow';

export const CONTAINER_COUNT_HOOK_ID = 'pid-mpc-container-count';

type InfraConfigReader = FieldReader<InfraConfigFields>;
type InfraConfigScope = HookScope<InfraConfigFields>;

function appendStatusUpdate(scope: InfraConfigScope): void {
  const entry: StatusUpdate = {
    status: scope.get('status'),
    statusUpdateTs: scope.get('statusUpdateTs'),
  };
  scope.assign('statusUpdates', [...scope.get('statusUpdates'), entry]);
}

function latestStamp(reader: InfraConfigReader): number {
  const history = reader.get('statusUpdates');
  const last = history[history.length - 1];
  return last ? last.statusUpdateTs : reader.get('statusUpdateTs');
}

// Runs on every status write: stamp first, then record the pair. The stamp
// never falls behind the last recorded one, even if the clock does.
export const postStatusHook = createUpdateHook<InfraConfigFields>({
  id: 'post-status-update',
  triggers: ['POST_UPDATE'],
  updateFunction: scope => {
    scope.assign('statusUpdateTs', Math.max(currentEpochSeconds(), latestStamp(scope)));
    appendStatusUpdate(scope);
  },
  description: 'Refresh statusUpdateTs and append to statusUpdates',
});

export const seedStatusHistoryHook = createUpdateHook<InfraConfigFields>({
  id: 'seed-status-history',
  triggers: ['POST_INIT'],
  updateCondition: reader => reader.get('statusUpdates').length === 0,
  updateFunction: appendStatusUpdate,
  description: 'Record the initial status of a new instance',
});

function firstOutOfOrder(history: StatusUpdate[]): number {
  return history.findIndex(
    (entry, i) =>
      !Number.isInteger(entry.statusUpdateTs) ||
      entry.statusUpdateTs < 0 ||
      (i > 0 && entry.statusUpdateTs < history[i - 1].statusUpdateTs)
  );
}

export const statusHistoryOrderHook = createGenericHook<InfraConfigFields>({
  id: 'status-history-order',
  triggers: ['POST_INIT'],
  hookCondition: reader => firstOutOfOrder(reader.get('statusUpdates')) !== -1,
  hookFunction: reader => {
    const history = reader.get('statusUpdates');
    const index = firstOutOfOrder(history);
    throw new InvariantViolation(
      'status-history-order',
      `statusUpdates[${index}] has timestamp ${history[index].statusUpdateTs}; timestamps must be non-negative integers in non-decreasing order`,
      { index, statusUpdateTs: history[index].statusUpdateTs }
    );
  },
});

function notValidContainers(reader: InfraConfigReader): boolean {
  const pid = reader.get('numPidContainers');
  const mpc = reader.get('numMpcContainers');
  if (!isPresent(pid) || !isPresent(mpc)) return false;
  return pid > mpc;
}

function raiseContainersError(reader: InfraConfigReader): void {
  const pid = reader.get('numPidContainers');
  const mpc = reader.get('numMpcContainers');
  throw new InvariantViolation(
    CONTAINER_COUNT_HOOK_ID,
    `numPidContainers must be less than or equal to numMpcContainers (${pid} > ${mpc})`,
    { numPidContainers: pid, numMpcContainers: mpc }
  );
}

export const numPidMpcContainersHook = createGenericHook<InfraConfigFields>({
  id: CONTAINER_COUNT_HOOK_ID,
  triggers: ['POST_INIT', 'POST_UPDATE'],
  hookCondition: notValidContainers,
  hookFunction: raiseContainersError,
});

export const instanceIdRequiredHook = createGenericHook<InfraConfigFields>({
  id: 'instanceId-required',
  triggers: ['POST_INIT'],
  hookCondition: reader => reader.get('instanceId').length === 0,
  hookFunction: () => {
    throw new InvariantViolation('instanceId-required', 'instanceId must be a non-empty string');
  },
});

type IntegerField =
  | 'statusUpdateTs'
  | 'numPidContainers'
  | 'numMpcContainers'
  | 'numFilesPerMpcContainer'
  | 'retryCounter'
  | 'creationTs'
  | 'endTs'
  | 'mpcComputeConcurrency';

function requireAtLeast(field: IntegerField, minimum: number) {
  return createGenericHook<InfraConfigFields>({
    id: `${field}-minimum`,
    triggers: ['POST_INIT', 'POST_UPDATE'],
    hookCondition: reader => {
      const value = reader.get(field);
      return !Number.isInteger(value) || value < minimum;
    },
    hookFunction: reader => {
      const value = reader.get(field);
      throw new InvariantViolation(
        `${field}-minimum`,
        `${field} must be an integer of at least ${minimum} (got ${value})`,
        { [field]: value }
      );
    },
  });
}

export const pcsFeaturesNormalizeHook = createUpdateHook<InfraConfigFields>({
  id: 'normalize-pcs-features',
  triggers: ['POST_INIT', 'POST_UPDATE'],
  updateCondition: reader => {
    const features = reader.get('pcsFeatures');
    return new Set(features).size !== features.length;
  },
  updateFunction: scope => {
    scope.assign('pcsFeatures', Array.from(new Set(scope.get('pcsFeatures'))));
  },
});

export const infraConfigRegistry = new FieldRegistry<InfraConfigFields>('InfraConfig', {
  identityField: 'instanceId',
})
  .defineField('instanceId', { mutability: 'IMMUTABLE_AFTER_INIT' })
  .defineField('role')
  .defineField('status')
  .defineField('statusUpdateTs', { mutability: 'DERIVED', defaultFactory: currentEpochSeconds })
  .defineField('instances', { defaultFactory: () => [] })
  .defineField('gameType', { mutability: 'IMMUTABLE_AFTER_INIT' })
  .defineField('numPidContainers')
  .defineField('numMpcContainers')
  .defineField('numFilesPerMpcContainer')
  .defineField('statusUpdates', { mutability: 'DERIVED', defaultFactory: () => [] })
  .defineField('tier', { mutability: 'IMMUTABLE_AFTER_INIT', defaultFactory: () => null })
  .defineField('pcsFeatures', { defaultFactory: () => [] })
  .defineField('pceConfig', { defaultFactory: () => null })
  .defineField('stageFlowClsName', { default: DEFAULT_STAGE_FLOW_CLS_NAME })
  .defineField('retryCounter', { default: 0 })
  .defineField('creationTs', { mutability: 'IMMUTABLE_AFTER_INIT', defaultFactory: currentEpochSeconds })
  .defineField('endTs', { default: 0 })
  .defineField('mpcComputeConcurrency', { default: 1 })
  .registerHook('instanceId', instanceIdRequiredHook)
  .registerHook('status', postStatusHook)
  .registerHook('statusUpdateTs', requireAtLeast('statusUpdateTs', 0))
  .registerHook('numPidContainers', requireAtLeast('numPidContainers', 1))
  .registerHook('numPidContainers', numPidMpcContainersHook)
  .registerHook('numMpcContainers', requireAtLeast('numMpcContainers', 1))
  .registerHook('numMpcContainers', numPidMpcContainersHook)
  .registerHook('numFilesPerMpcContainer', requireAtLeast('numFilesPerMpcContainer', 1))
  .registerHook('statusUpdates', statusHistoryOrderHook)
  .registerHook('statusUpdates', seedStatusHistoryHook)
  .registerHook('pcsFeatures', pcsFeaturesNormalizeHook)
  .registerHook('retryCounter', requireAtLeast('retryCounter', 0))
  .registerHook('creationTs', requireAtLeast('creationTs', 0))
  .registerHook('endTs', requireAtLeast('endTs', 0))
  .registerHook('mpcComputeConcurrency', requireAtLeast('mpcComputeConcurrency', 1))
  .seal();

/**
 * Infra metadata of one private computation instance.
 *
 * `instanceId`, `gameType` and `creationTs` are fixed at construction;
 * `tier` may be set once. `statusUpdateTs` and `statusUpdates` belong to the
 * status hook: each status write stamps the time and appends to the history,
 * and callers cannot write either field. Container counts must keep
 * `numPidContainers <= numMpcContainers`.
 */
export class InfraConfig extends GovernedEntity<InfraConfigFields> {
  constructor(init: InfraConfigInit) {
    super(infraConfigRegistry, init);
  }

  get instanceId(): string {
    return this.get('instanceId');
  }

  get status(): InstanceStatus {
    return this.get('status');
  }

  get statusUpdates(): StatusUpdate[] {
    return this.get('statusUpdates');
  }

  updateStatus(status: InstanceStatus): void {
    this.set('status', status);
  }

  addStageInstance(record: StageInstanceRecord): void {
    this.set('instances', [...this.get('instances'), record]);
  }

  toJSON(): InfraConfigFields {
    return {
      instanceId: this.get('instanceId'),
      role: this.get('role'),
      status: this.get('status'),
      statusUpdateTs: this.get('statusUpdateTs'),
      instances: this.get('instances'),
      gameType: this.get('gameType'),
      numPidContainers: this.get('numPidContainers'),
      numMpcContainers: this.get('numMpcContainers'),
      numFilesPerMpcContainer: this.get('numFilesPerMpcContainer'),
      statusUpdates: this.get('statusUpdates'),
      tier: this.get('tier'),
      pcsFeatures: this.get('pcsFeatures'),
      pceConfig: this.get('pceConfig'),
      stageFlowClsName: this.get('stageFlowClsName'),
      retryCounter: this.get('retryCounter'),
      creationTs: this.get('creationTs'),
      endTs: this.get('endTs'),
      mpcComputeConcurrency: this.get('mpcComputeConcurrency'),
    };
  }
}

export function createInfraConfig(init: InfraConfigInit): InfraConfig {
  return new InfraConfig(init);
}
