/**
 * Decision Engine Tests
 *
 * Thresholds WARNING >= 3, DANGER >= 7 unless a test says otherwise.
 */

import {
  DEFAULT_THRESHOLDS,
  clampCount,
  compareStatus,
  decide,
  determineAction,
  determineStatus,
  isAtLeast,
  toServoCommand,
  type DetectionStatus,
} from './decisionEngine';

describe('determineStatus', () => {
  it('should return SAFE below the warning threshold', () => {
    expect(determineStatus(0)).toBe('SAFE');
    expect(determineStatus(2)).toBe('SAFE');
  });

  it('should return WARNING from the warning threshold up to danger', () => {
    expect(determineStatus(3)).toBe('WARNING');
    expect(determineStatus(6)).toBe('WARNING');
  });

  it('should return DANGER at and above the danger threshold', () => {
    expect(determineStatus(7)).toBe('DANGER');
    expect(determineStatus(8)).toBe('DANGER');
    expect(determineStatus(500)).toBe('DANGER');
  });

  it('should never decrease severity as the count grows', () => {
    let previous: DetectionStatus = determineStatus(0);
    for (let count = 1; count <= 50; count++) {
      const current = determineStatus(count);
      expect(compareStatus(current, previous)).toBeGreaterThanOrEqual(0);
      previous = current;
    }
  });

  it('should honor custom thresholds', () => {
    const thresholds = { warning: 1, danger: 2 };
    expect(determineStatus(0, thresholds)).toBe('SAFE');
    expect(determineStatus(1, thresholds)).toBe('WARNING');
    expect(determineStatus(2, thresholds)).toBe('DANGER');
  });

  it('should skip WARNING when both thresholds are equal', () => {
    const thresholds = { warning: 5, danger: 5 };
    expect(determineStatus(4, thresholds)).toBe('SAFE');
    expect(determineStatus(5, thresholds)).toBe('DANGER');
  });
});

describe('determineAction', () => {
  it('should sleep when safe and activate otherwise', () => {
    expect(determineAction('SAFE')).toBe('SLEEP');
    expect(determineAction('WARNING')).toBe('ACTIVATE');
    expect(determineAction('DANGER')).toBe('ACTIVATE');
  });
});

describe('decide', () => {
  it('should map an empty frame to SAFE/SLEEP', () => {
    expect(decide(0)).toEqual({ status: 'SAFE', action: 'SLEEP' });
  });

  it('should map 8 larvae to DANGER/ACTIVATE', () => {
    expect(decide(8)).toEqual({ status: 'DANGER', action: 'ACTIVATE' });
  });

  it('should clamp negative and fractional counts before deciding', () => {
    expect(decide(-4)).toEqual({ status: 'SAFE', action: 'SLEEP' });
    expect(decide(6.9)).toEqual({ status: 'WARNING', action: 'ACTIVATE' });
  });
});

describe('helpers', () => {
  it('clampCount should floor and reject non-finite values', () => {
    expect(clampCount(3.7)).toBe(3);
    expect(clampCount(-1)).toBe(0);
    expect(clampCount(Number.NaN)).toBe(0);
    expect(clampCount(Number.POSITIVE_INFINITY)).toBe(0);
  });

  it('isAtLeast should order SAFE < WARNING < DANGER', () => {
    expect(isAtLeast('DANGER', 'WARNING')).toBe(true);
    expect(isAtLeast('WARNING', 'WARNING')).toBe(true);
    expect(isAtLeast('SAFE', 'WARNING')).toBe(false);
  });

  it('toServoCommand should translate actions for the firmware', () => {
    expect(toServoCommand('ACTIVATE')).toBe('ACTIVATE_SERVO');
    expect(toServoCommand('SLEEP')).toBe('STOP_SERVO');
  });

  it('should default to warning 3 and danger 7', () => {
    expect(DEFAULT_THRESHOLDS).toEqual({ warning: 3, danger: 7 });
  });
});
