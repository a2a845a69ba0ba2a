import type {
  FrameDimensions,
  PixelPoint,
  PoseLandmark,
  PoseLandmarks,
  PostureMetrics,
} from './types';

const toDegrees = (radians: number) => (radians * 180) / Math.PI;

const toPixel = (landmark: PoseLandmark, { width, height }: FrameDimensions): PixelPoint => ({
  x: Math.trunc(landmark.x * width),
  y: Math.trunc(landmark.y * height),
});

const midpoint = (a: PixelPoint, b: PixelPoint): PixelPoint => ({
  x: Math.floor((a.x + b.x) / 2),
  y: Math.floor((a.y + b.y) / 2),
});

/**
 * Angle at vertex `b` formed by `a → b → c`, in degrees ([0, 180]).
 * A zero-length arm yields 0 rather than NaN.
 */
export const calculateAngle = (a: PixelPoint, b: PixelPoint, c: PixelPoint): number => {
  const ba = { x: a.x - b.x, y: a.y - b.y };
  const bc = { x: c.x - b.x, y: c.y - b.y };

  const dot = ba.x * bc.x + ba.y * bc.y;
  const magnitude = Math.hypot(ba.x, ba.y) * Math.hypot(bc.x, bc.y);

  if (magnitude === 0) {
    return 0;
  }

  const cos = Math.max(-1, Math.min(1, dot / magnitude));
  return toDegrees(Math.acos(cos));
};

export interface PostureKeypoints {
  nose: PixelPoint;
  leftShoulder: PixelPoint;
  rightShoulder: PixelPoint;
  neck: PixelPoint;
  leftHip: PixelPoint;
  rightHip: PixelPoint;
  midHip: PixelPoint;
}

export const extractKeypoints = (
  landmarks: PoseLandmarks,
  dimensions: FrameDimensions,
): PostureKeypoints => {
  const leftShoulder = toPixel(landmarks.leftShoulder, dimensions);
  const rightShoulder = toPixel(landmarks.rightShoulder, dimensions);
  const leftHip = toPixel(landmarks.leftHip, dimensions);
  const rightHip = toPixel(landmarks.rightHip, dimensions);

  return {
    nose: toPixel(landmarks.nose, dimensions),
    leftShoulder,
    rightShoulder,
    neck: midpoint(leftShoulder, rightShoulder),
    leftHip,
    rightHip,
    midHip: midpoint(leftHip, rightHip),
  };
};

export const computeMetricsFromKeypoints = (keypoints: PostureKeypoints): PostureMetrics => {
  const { nose, neck, midHip, leftShoulder, rightShoulder } = keypoints;
  const shoulderMid = midpoint(leftShoulder, rightShoulder);

  return {
    neckAngle: calculateAngle(nose, neck, midHip),
    spineTilt: Math.abs(neck.x - midHip.x),
    shoulderTilt: Math.abs(leftShoulder.y - rightShoulder.y),
    noseShoulderDistance: Math.abs(nose.y - shoulderMid.y),
    shoulderMidX: shoulderMid.x,
    noseX: nose.x,
    noseY: nose.y,
    shoulderAvgY: shoulderMid.y,
  };
};

/** Scales normalized landmarks to pixel space and derives the posture metrics. */
export const computePostureMetrics = (
  landmarks: PoseLandmarks,
  dimensions: FrameDimensions,
): PostureMetrics => computeMetricsFromKeypoints(extractKeypoints(landmarks, dimensions));
