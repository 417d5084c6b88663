import { z } from 'zod';
import {
  PID_PROTOCOL_DEFAULTS,
  getMaxIdColumnCnt,
  getPidProtocolFromNumShards,
  pidShouldUseRowNumbers,
  type PIDProtocol,
} from '../pid/protocol.js';

export const RESULT_VISIBILITY = {
  PUBLIC: 0,
  PUBLISHER: 1,
  PARTNER: 2,
} as const;

export type ResultVisibility = (typeof RESULT_VISIBILITY)[keyof typeof RESULT_VISIBILITY];

export const ATTRIBUTION_RULES = [
  'last_click_1d',
  'last_click_7d',
  'last_click_28d',
  'last_touch_1d',
  'last_touch_7d',
  'last_touch_28d',
  'last_click_2_7d',
  'last_touch_2_7d',
  'last_click_1d_targetid',
] as const;

export type AttributionRule = (typeof ATTRIBUTION_RULES)[number];

export const breakdownKeySchema = z.object({
  cellId: z.number().int(),
  objectiveId: z.number().int(),
});

export const postProcessingDataSchema = z.object({
  initialInputDataCount: z.number().int().nonnegative().default(0),
  dedupedInputDataCount: z.number().int().nonnegative().default(0),
});

export const commonProductConfigSchema = z.object({
  inputPath: z.string().min(1),
  outputDir: z.string().min(1),
  hmacKey: z.string().optional(),
  /** Rows per id the partner side is padded to; used by attribution runs. */
  paddingSize: z.number().int().positive().optional(),
  resultVisibility: z
    .union([
      z.literal(RESULT_VISIBILITY.PUBLIC),
      z.literal(RESULT_VISIBILITY.PUBLISHER),
      z.literal(RESULT_VISIBILITY.PARTNER),
    ])
    .default(RESULT_VISIBILITY.PUBLIC),
  pidUseRowNumbers: z.boolean().default(true),
  multikeyEnabled: z.boolean().default(true),
  pidProtocol: z
    .enum(['UNION_PID', 'PS3I_M_TO_M', 'UNION_PID_MULTIKEY'])
    .default(PID_PROTOCOL_DEFAULTS.DEFAULT_PID_PROTOCOL),
  pidMaxColumnCount: z.number().int().positive().default(1),
  pidConfigs: z.record(z.string(), z.unknown()).optional(),
  postProcessingData: postProcessingDataSchema.optional(),
});

export const attributionConfigSchema = z.object({
  kind: z.literal('attribution'),
  common: commonProductConfigSchema,
  aggregationType: z.literal('measurement'),
  attributionRule: z.enum(ATTRIBUTION_RULES).default('last_click_1d'),
});

export const liftConfigSchema = z.object({
  kind: z.literal('lift'),
  common: commonProductConfigSchema,
  /** Matched conversions needed before lift results become viewable. */
  kAnonymityThreshold: z.number().int().nonnegative().default(0),
  breakdownKey: breakdownKeySchema.optional(),
});

export const productConfigSchema = z.discriminatedUnion('kind', [attributionConfigSchema, liftConfigSchema]);

export type CommonProductConfig = z.infer<typeof commonProductConfigSchema>;
export type AttributionConfig = z.infer<typeof attributionConfigSchema>;
export type LiftConfig = z.infer<typeof liftConfigSchema>;
export type ProductConfig = z.infer<typeof productConfigSchema>;
export type ProductConfigInput = z.input<typeof productConfigSchema>;

export class ProductConfigParseError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid product config: ${issues.join('; ')}`);
    this.name = 'ProductConfigParseError';
  }
}

export function parseProductConfig(data: unknown): ProductConfig {
  const result = productConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ProductConfigParseError(
      result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return result.data;
}

export interface PidSettings {
  pidProtocol: PIDProtocol;
  pidMaxColumnCount: number;
  useRowNumbers: boolean;
}

/** Protocol, identifier column count and row numbering for a run with this many PID shards. */
export function resolvePidSettings(common: CommonProductConfig, numPidContainers: number): PidSettings {
  const pidProtocol = getPidProtocolFromNumShards(numPidContainers, common.multikeyEnabled);
  return {
    pidProtocol,
    pidMaxColumnCount: getMaxIdColumnCnt(pidProtocol),
    useRowNumbers: pidShouldUseRowNumbers(common.pidUseRowNumbers, pidProtocol),
  };
}
