import { POSTURE_THRESHOLDS } from './classifier';

const PENALTY_WEIGHT = 0.4;

/** 0–100, independent of the classifier label. */
export const computePostureScore = (
  neckAngle: number,
  spineTilt: number,
  shoulderTilt: number,
): number => {
  const raw =
    100 -
    Math.abs(POSTURE_THRESHOLDS.neckAngle - neckAngle) * PENALTY_WEIGHT -
    spineTilt * PENALTY_WEIGHT -
    shoulderTilt * PENALTY_WEIGHT;

  return Math.max(0, Math.min(100, Math.trunc(raw)));
};
