export type PIDProtocol = 'UNION_PID' | 'PS3I_M_TO_M' | 'UNION_PID_MULTIKEY';

export const PID_PROTOCOL_DEFAULTS = {
  DEFAULT_PID_PROTOCOL: 'UNION_PID',
  DEFAULT_MULTIKEY_PROTOCOL_MAX_COLUMN_COUNT: 6,
} as const satisfies {
  DEFAULT_PID_PROTOCOL: PIDProtocol;
  DEFAULT_MULTIKEY_PROTOCOL_MAX_COLUMN_COUNT: number;
};

export const PID_PROTOCOLS: readonly PIDProtocol[] = ['UNION_PID', 'PS3I_M_TO_M', 'UNION_PID_MULTIKEY'];

export function getMaxIdColumnCnt(pidProtocol: PIDProtocol): number {
  if (pidProtocol === 'UNION_PID_MULTIKEY') {
    return PID_PROTOCOL_DEFAULTS.DEFAULT_MULTIKEY_PROTOCOL_MAX_COLUMN_COUNT;
  }
  return 1;
}

// Multikey matching only runs on a single shard.
export function getPidProtocolFromNumShards(numPidContainers: number, multikeyEnabled: boolean): PIDProtocol {
  if (numPidContainers === 1 && multikeyEnabled) {
    return 'UNION_PID_MULTIKEY';
  }
  return PID_PROTOCOL_DEFAULTS.DEFAULT_PID_PROTOCOL;
}

export function pidShouldUseRowNumbers(pidUseRowNumbers: boolean, pidProtocol: PIDProtocol): boolean {
  return pidUseRowNumbers && pidProtocol !== 'UNION_PID_MULTIKEY';
}
