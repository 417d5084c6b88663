import { describe, expect, it } from 'vitest';
import { getMaxIdColumnCnt, getPidProtocolFromNumShards, pidShouldUseRowNumbers } from './protocol.js';

describe('PID protocol selection', () => {
  it('uses multikey only for a single shard with multikey enabled', () => {
    expect(getPidProtocolFromNumShards(1, true)).toBe('UNION_PID_MULTIKEY');
    expect(getPidProtocolFromNumShards(1, false)).toBe('UNION_PID');
    expect(getPidProtocolFromNumShards(4, true)).toBe('UNION_PID');
  });

  it('allows several id columns only for multikey', () => {
    expect(getMaxIdColumnCnt('UNION_PID_MULTIKEY')).toBe(6);
    expect(getMaxIdColumnCnt('UNION_PID')).toBe(1);
    expect(getMaxIdColumnCnt('PS3I_M_TO_M')).toBe(1);
  });

  it('never uses row numbers with multikey', () => {
    expect(pidShouldUseRowNumbers(true, 'UNION_PID')).toBe(true);
    expect(pidShouldUseRowNumbers(true, 'UNION_PID_MULTIKEY')).toBe(false);
    expect(pidShouldUseRowNumbers(false, 'UNION_PID')).toBe(false);
  });
});
