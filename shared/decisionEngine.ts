/**
 * Larva Detection Decision Engine
 *
 * SINGLE SOURCE OF TRUTH for severity and recommended device action.
 *
 * Rules:
 * 1. count ≥ danger threshold → DANGER
 * 2. count ≥ warning threshold → WARNING
 * 3. otherwise → SAFE
 * 4. SAFE → SLEEP, WARNING/DANGER → ACTIVATE
 *
 * Thresholds are configuration (see server/config.ts). The function shape is
 * fixed: a higher count never yields a lower severity.
 */

import type { ControlCommand } from './schema';

export const DETECTION_STATUSES = ['SAFE', 'WARNING', 'DANGER'] as const;
export type DetectionStatus = typeof DETECTION_STATUSES[number];

export const DECISION_ACTIONS = ['ACTIVATE', 'SLEEP'] as const;
export type DecisionAction = typeof DECISION_ACTIONS[number];

export interface DecisionThresholds {
  warning: number;
  danger: number;
}

export const DEFAULT_THRESHOLDS: DecisionThresholds = {
  warning: 3,
  danger: 7,
};

const STATUS_RANK: Record<DetectionStatus, number> = {
  SAFE: 0,
  WARNING: 1,
  DANGER: 2,
};

const STATUS_ACTIONS: Record<DetectionStatus, DecisionAction> = {
  SAFE: 'SLEEP',
  WARNING: 'ACTIVATE',
  DANGER: 'ACTIVATE',
};

/**
 * Normalize a raw detection count: floors fractions, maps negatives and
 * non-finite values to 0.
 */
export function clampCount(count: number): number {
  if (!Number.isFinite(count) || count <= 0) return 0;
  return Math.floor(count);
}

export function determineStatus(
  targetCount: number,
  thresholds: DecisionThresholds = DEFAULT_THRESHOLDS
): DetectionStatus {
  if (targetCount >= thresholds.danger) return 'DANGER';
  if (targetCount >= thresholds.warning) return 'WARNING';
  return 'SAFE';
}

export function determineAction(status: DetectionStatus): DecisionAction {
  return STATUS_ACTIONS[status];
}

/** Negative when a < b, 0 when equal, positive when a > b. */
export function compareStatus(a: DetectionStatus, b: DetectionStatus): number {
  return STATUS_RANK[a] - STATUS_RANK[b];
}

export function isAtLeast(status: DetectionStatus, floor: DetectionStatus): boolean {
  return compareStatus(status, floor) >= 0;
}

// Firmware only understands servo commands
export function toServoCommand(action: DecisionAction): ControlCommand {
  return action === 'ACTIVATE' ? 'ACTIVATE_SERVO' : 'STOP_SERVO';
}

export const DEFAULT_AUTOMATIC_COMMAND: ControlCommand = 'STOP_SERVO';

export interface Decision {
  status: DetectionStatus;
  action: DecisionAction;
}

export function decide(
  targetCount: number,
  thresholds: DecisionThresholds = DEFAULT_THRESHOLDS
): Decision {
  const status = determineStatus(clampCount(targetCount), thresholds);
  return { status, action: determineAction(status) };
}
