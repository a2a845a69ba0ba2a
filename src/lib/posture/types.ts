// ─── Landmarks ────────────────────────────────────────
export const POSE_LANDMARK_NAMES = [
  'nose',
  'leftEyeInner',
  'leftEye',
  'leftEyeOuter',
  'rightEyeInner',
  'rightEye',
  'rightEyeOuter',
  'leftEar',
  'rightEar',
  'mouthLeft',
  'mouthRight',
  'leftShoulder',
  'rightShoulder',
  'leftElbow',
  'rightElbow',
  'leftWrist',
  'rightWrist',
  'leftPinky',
  'rightPinky',
  'leftIndex',
  'rightIndex',
  'leftThumb',
  'rightThumb',
  'leftHip',
  'rightHip',
  'leftKnee',
  'rightKnee',
  'leftAnkle',
  'rightAnkle',
  'leftHeel',
  'rightHeel',
  'leftFootIndex',
  'rightFootIndex',
] as const;

export type PoseLandmarkName = (typeof POSE_LANDMARK_NAMES)[number];

export type PoseLandmark = {
  x: number;
  y: number;
  z?: number | null;
  visibility?: number | null;
};

export type RequiredLandmarkName =
  | 'nose'
  | 'leftShoulder'
  | 'rightShoulder'
  | 'leftHip'
  | 'rightHip';

/** Normalized ([0,1]) landmarks for one frame, as returned by the detector. */
export type PoseLandmarks = Record<RequiredLandmarkName, PoseLandmark> &
  Partial<Record<Exclude<PoseLandmarkName, RequiredLandmarkName>, PoseLandmark>>;

export interface FrameDimensions {
  width: number;
  height: number;
}

export interface LandmarkDump {
  index: number;
  name: PoseLandmarkName;
  x: number;
  y: number;
  z: number | null;
  visibility: number | null;
}

// ─── Metrics ──────────────────────────────────────────
export type PixelPoint = { x: number; y: number };

export interface PostureMetrics {
  neckAngle: number;
  spineTilt: number;
  shoulderTilt: number;
  noseShoulderDistance: number;
  shoulderMidX: number;
  noseX: number;
  noseY: number;
  shoulderAvgY: number;
}

// ─── Classification ───────────────────────────────────
export type PostureLabel =
  | 'No person detected'
  | 'Severely Slouched'
  | 'Slightly Slouched'
  | 'Leaning Forward'
  | 'Leaning Backward'
  | 'Severe Lean Left'
  | 'Severe Lean Right'
  | 'Leaning Left'
  | 'Leaning Right'
  | 'Good Posture'
  | 'Bad Posture';

/** BGR triple, kept in the order overlay renderers expect. */
export type SeverityColor = readonly [number, number, number];

export interface PostureClassification {
  label: PostureLabel;
  color: SeverityColor;
  isGoodPosture: boolean;
}

export type NoDetection = {
  kind: 'no_detection';
  label: 'No person detected';
  color: SeverityColor;
  score: 0;
  isGoodPosture: false;
};

export type Detected = PostureClassification & {
  kind: 'detected';
  score: number;
  metrics: PostureMetrics;
  landmarks: LandmarkDump[];
};

export type PostureAnalysis = NoDetection | Detected;
