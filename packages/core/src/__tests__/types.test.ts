import { describe, it, expect } from 'vitest';
import {
  ConnectionState,
  Dialect,
  LockState,
  OverrideType,
  ReaderMode,
  summarizeOutcome,
} from '../types.js';

describe('Core Type Exports', () => {
  it('exports LockState enum values', () => {
    expect(LockState.LOCKED).toBe('LOCKED');
    expect(LockState.UNLOCKED).toBe('UNLOCKED');
  });

  it('exports OverrideType enum values', () => {
    expect(OverrideType.TIMED).toBe('TIMED');
    expect(OverrideType.UNTIL_RESUMED).toBe('UNTIL_RESUMED');
    expect(OverrideType.UNTIL_NEXT_SCHEDULE).toBe('UNTIL_NEXT_SCHEDULE');
  });

  it('exports every reader mode', () => {
    expect(Object.values(ReaderMode)).toEqual([
      'NONE',
      'CARD',
      'PIN',
      'UNLOCK',
      'CARD_AND_PIN',
      'CARD_OR_PIN',
      'FIRST_CREDENTIAL_IN',
      'DUAL_CREDENTIAL',
      'LOCKDOWN',
    ]);
  });

  it('exports ConnectionState enum values', () => {
    expect(ConnectionState.IDLE).toBe('IDLE');
    expect(ConnectionState.CONNECTING).toBe('CONNECTING');
    expect(ConnectionState.RUNNING).toBe('RUNNING');
    expect(ConnectionState.RECONNECTING).toBe('RECONNECTING');
    expect(ConnectionState.STOPPED).toBe('STOPPED');
    expect(ConnectionState.ERROR).toBe('ERROR');
  });

  it('exports Dialect enum values', () => {
    expect(Dialect.PROTECTORNET).toBe('PROTECTORNET');
    expect(Dialect.ODYSSEY).toBe('ODYSSEY');
  });
});

describe('summarizeOutcome', () => {
  it('splits targets by success', () => {
    const outcome = summarizeOutcome([
      { target: 1, success: true },
      { target: 2, success: false, error: 'Door not found' },
      { target: 3, success: true },
    ]);

    expect(outcome.succeeded).toEqual([1, 3]);
    expect(outcome.failed).toEqual([2]);
    expect(outcome.results).toHaveLength(3);
  });
});
