import { decodeFrame, type DecodeFrameOptions } from '@/lib/frames/decodeFrame';
import type { PoseDetector } from '@/lib/detector/poseDetector';
import { classifyPosture, SEVERITY_COLORS } from './classifier';
import { computePostureMetrics } from './metrics';
import { computePostureScore } from './score';
import {
  POSE_LANDMARK_NAMES,
  type FrameDimensions,
  type LandmarkDump,
  type NoDetection,
  type PoseLandmarks,
  type PostureAnalysis,
} from './types';

export const NO_DETECTION: NoDetection = {
  kind: 'no_detection',
  label: 'No person detected',
  color: SEVERITY_COLORS.blue,
  score: 0,
  isGoodPosture: false,
};

export const dumpLandmarks = (landmarks: PoseLandmarks): LandmarkDump[] =>
  POSE_LANDMARK_NAMES.flatMap((name, index) => {
    const point = landmarks[name];
    if (!point) return [];
    return [
      {
        index,
        name,
        x: point.x,
        y: point.y,
        z: point.z ?? null,
        visibility: point.visibility ?? null,
      },
    ];
  });

/** Pure: landmarks (or none) → tagged analysis result. */
export const analyzeLandmarks = (
  landmarks: PoseLandmarks | null,
  dimensions: FrameDimensions,
): PostureAnalysis => {
  if (!landmarks) {
    return NO_DETECTION;
  }

  const metrics = computePostureMetrics(landmarks, dimensions);
  const classification = classifyPosture(metrics);

  return {
    kind: 'detected',
    ...classification,
    score: computePostureScore(metrics.neckAngle, metrics.spineTilt, metrics.shoulderTilt),
    metrics,
    landmarks: dumpLandmarks(landmarks),
  };
};

/**
 * Full per-frame pipeline: decode → detector → metrics/classifier/score.
 * Throws before anything is returned, so callers never see a partial result.
 */
export async function analyzeFrame(
  input: string | Buffer,
  detector: PoseDetector,
  options: DecodeFrameOptions = {},
): Promise<PostureAnalysis> {
  const frame = await decodeFrame(input, options);
  const landmarks = await detector.detect(frame);
  return analyzeLandmarks(landmarks, frame);
}
