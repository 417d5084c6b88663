import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { InfraConfig, type InfraConfigFields } from './infra-config.js';
import { INSTANCE_STATUSES } from './status.js';

// Bounds mirror the entity's own hooks, so every READY entity round-trips.
const epochSeconds = z.number().int().nonnegative();

const statusSchema = z.enum(INSTANCE_STATUSES);

export const statusUpdateSchema = z.object({
  status: statusSchema,
  statusUpdateTs: epochSeconds,
});

export const stageInstanceRecordSchema = z.object({
  kind: z.enum(['PID', 'MPC', 'POST_PROCESSING', 'STAGE_STATE']),
  instanceId: z.string(),
  status: z.string(),
});

export const pceConfigSchema = z.object({
  subnets: z.array(z.string()),
  cluster: z.string(),
  region: z.string(),
  oneDockerTaskDefinition: z.string(),
});

export const infraConfigSchema = z.object({
  instanceId: z.string().min(1),
  role: z.enum(['PUBLISHER', 'PARTNER']),
  status: statusSchema,
  statusUpdateTs: epochSeconds,
  instances: z.array(stageInstanceRecordSchema),
  gameType: z.enum(['LIFT', 'ATTRIBUTION']),
  numPidContainers: z.number().int().positive(),
  numMpcContainers: z.number().int().positive(),
  numFilesPerMpcContainer: z.number().int().positive(),
  statusUpdates: z.array(statusUpdateSchema),
  tier: z.string().nullable(),
  pcsFeatures: z.array(z.string()),
  pceConfig: pceConfigSchema.nullable(),
  stageFlowClsName: z.string(),
  retryCounter: z.number().int().nonnegative(),
  creationTs: epochSeconds,
  endTs: epochSeconds,
  mpcComputeConcurrency: z.number().int().positive(),
});

export class InfraConfigParseError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid InfraConfig payload: ${issues.join('; ')}`);
    this.name = 'InfraConfigParseError';
  }
}

export function parseInfraConfigFields(data: unknown): InfraConfigFields {
  const result = infraConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    logger.warn('infra_config_parse_failed', 'InfraConfig payload failed validation', { issues });
    throw new InfraConfigParseError(issues);
  }
  return result.data;
}

/**
 * Rebuilds a READY InfraConfig from stored fields. The stored history is
 * kept as is, and construction hooks re-check every invariant.
 */
export function restoreInfraConfig(data: unknown): InfraConfig {
  return new InfraConfig(parseInfraConfigFields(data));
}

export function serializeInfraConfig(config: InfraConfig): string {
  return JSON.stringify(config.toJSON());
}

export function deserializeInfraConfig(json: string): InfraConfig {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InfraConfigParseError([error instanceof Error ? error.message : 'Malformed JSON']);
  }
  return restoreInfraConfig(data);
}
