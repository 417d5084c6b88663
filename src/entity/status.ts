export const INSTANCE_STATUSES = [
  'UNKNOWN',
  'CREATED',
  'INPUT_DATA_VALIDATION_STARTED',
  'INPUT_DATA_VALIDATION_COMPLETED',
  'INPUT_DATA_VALIDATION_FAILED',
  'ID_MATCHING_STARTED',
  'ID_MATCHING_COMPLETED',
  'ID_MATCHING_FAILED',
  'COMPUTATION_STARTED',
  'COMPUTATION_COMPLETED',
  'COMPUTATION_FAILED',
  'AGGREGATION_STARTED',
  'AGGREGATION_COMPLETED',
  'AGGREGATION_FAILED',
  'POST_PROCESSING_HANDLERS_STARTED',
  'POST_PROCESSING_HANDLERS_COMPLETED',
  'POST_PROCESSING_HANDLERS_FAILED',
  'PROCESSING_REQUEST',
  'TIMEOUT',
] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

export interface StatusUpdate {
  status: InstanceStatus;
  statusUpdateTs: number;
}

/** Whole seconds since the UTC epoch. */
export function currentEpochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
