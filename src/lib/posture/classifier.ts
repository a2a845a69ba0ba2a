import type { PostureClassification, PostureLabel, PostureMetrics, SeverityColor } from './types';

export const POSTURE_THRESHOLDS = {
  neckAngle: 175,
  spineTilt: 10,
  shoulderTilt: 25,
  lean: 30,
  headDrop: 60,
  tolerance: 3,
  forwardDistance: 140,
  backwardDistance: 200,
  severeLeanFactor: 2.4,
  leanFactor: 0.5,
} as const;

export const SEVERITY_COLORS = {
  red: [0, 0, 255],
  orange: [0, 165, 255],
  green: [0, 255, 0],
  blue: [255, 0, 0],
} as const satisfies Record<string, SeverityColor>;

type PostureRule = {
  label: PostureLabel;
  color: SeverityColor;
  matches: (metrics: PostureMetrics) => boolean;
};

const T = POSTURE_THRESHOLDS;

// Evaluated top to bottom; the first match wins. Lean labels are mirrored
// relative to the image (nose right of centre reads as "Left").
const RULES: readonly PostureRule[] = [
  {
    label: 'Severely Slouched',
    color: SEVERITY_COLORS.red,
    matches: (m) => m.noseY > m.shoulderAvgY + T.headDrop,
  },
  {
    label: 'Slightly Slouched',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseY > m.shoulderAvgY + Math.floor(T.headDrop / 2),
  },
  {
    label: 'Leaning Forward',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseShoulderDistance < T.forwardDistance,
  },
  {
    label: 'Leaning Backward',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseShoulderDistance > T.backwardDistance,
  },
  {
    label: 'Severe Lean Left',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseX > m.shoulderMidX + T.lean * T.severeLeanFactor,
  },
  {
    label: 'Severe Lean Right',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseX < m.shoulderMidX - T.lean * T.severeLeanFactor,
  },
  {
    label: 'Leaning Left',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseX > m.shoulderMidX + T.lean * T.leanFactor,
  },
  {
    label: 'Leaning Right',
    color: SEVERITY_COLORS.orange,
    matches: (m) => m.noseX < m.shoulderMidX - T.lean * T.leanFactor,
  },
  {
    label: 'Good Posture',
    color: SEVERITY_COLORS.green,
    matches: (m) =>
      m.neckAngle >= T.neckAngle - T.tolerance &&
      m.spineTilt <= T.spineTilt + T.tolerance &&
      m.shoulderTilt <= T.shoulderTilt + T.tolerance,
  },
];

export const isGoodPostureLabel = (label: PostureLabel) => label.includes('Good');

export const classifyPosture = (metrics: PostureMetrics): PostureClassification => {
  const rule = RULES.find((candidate) => candidate.matches(metrics));
  const label: PostureLabel = rule?.label ?? 'Bad Posture';
  const color: SeverityColor = rule?.color ?? SEVERITY_COLORS.red;

  return { label, color, isGoodPosture: isGoodPostureLabel(label) };
};
