import sharp from 'sharp';
import { vi } from 'vitest';
import type { PoseDetector } from '@/lib/detector/poseDetector';
import { SEVERITY_COLORS } from '@/lib/posture/classifier';
import type { Detected, PoseLandmarks, PostureMetrics } from '@/lib/posture/types';
import {
  computeStoreStatistics,
  type SessionStore,
  type StoredSessionRecord,
  type StoredSessionRow,
  type StoreStatistics,
} from '@/lib/store/sessionStore';

/** Upright subject; on a 640x480 frame this classifies as "Good Posture" with score 98. */
export const UPRIGHT_LANDMARKS: PoseLandmarks = {
  nose: { x: 0.5, y: 0.125, z: -0.2, visibility: 0.99 },
  leftShoulder: { x: 0.375, y: 0.5, z: 0, visibility: 0.98 },
  rightShoulder: { x: 0.625, y: 0.5, z: 0, visibility: 0.97 },
  leftHip: { x: 0.375, y: 0.875 },
  rightHip: { x: 0.625, y: 0.875 },
};

/** Head dropped below the shoulder line; "Severely Slouched" with score 30 on 640x480. */
export const SLUMPED_LANDMARKS: PoseLandmarks = {
  ...UPRIGHT_LANDMARKS,
  nose: { x: 0.5, y: 0.75 },
};

export const FRAME_640x480 = { width: 640, height: 480 };

export const baseMetrics = (overrides: Partial<PostureMetrics> = {}): PostureMetrics => ({
  neckAngle: 180,
  spineTilt: 0,
  shoulderTilt: 0,
  noseShoulderDistance: 180,
  shoulderMidX: 320,
  noseX: 320,
  noseY: 60,
  shoulderAvgY: 240,
  ...overrides,
});

export const detectedAnalysis = (isGoodPosture: boolean, score: number): Detected => ({
  kind: 'detected',
  label: isGoodPosture ? 'Good Posture' : 'Bad Posture',
  color: isGoodPosture ? SEVERITY_COLORS.green : SEVERITY_COLORS.red,
  isGoodPosture,
  score,
  metrics: baseMetrics(),
  landmarks: [],
});

export const createPng = (width: number, height: number): Promise<Buffer> =>
  sharp({
    create: { width, height, channels: 3, background: { r: 40, g: 80, b: 120 } },
  })
    .png()
    .toBuffer();

export const fakeDetector = (landmarks: PoseLandmarks | null = UPRIGHT_LANDMARKS) => {
  const detect = vi.fn<PoseDetector['detect']>(async () => landmarks);
  return { detect };
};

export class MemorySessionStore implements SessionStore {
  records: StoredSessionRecord[] = [];
  failWrites = false;

  async append(record: StoredSessionRecord): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.records.push(record);
  }

  async list(): Promise<StoredSessionRow[]> {
    return [...this.records];
  }

  async recent(limit: number): Promise<StoredSessionRow[]> {
    return limit > 0 ? this.records.slice(-limit) : [];
  }

  async findById(sessionId: string): Promise<StoredSessionRow | null> {
    return this.records.find((record) => record.session_id === sessionId) ?? null;
  }

  async deleteById(sessionId: string): Promise<boolean> {
    const before = this.records.length;
    this.records = this.records.filter((record) => record.session_id !== sessionId);
    return this.records.length < before;
  }

  async clear(): Promise<void> {
    this.records = [];
  }

  async statistics(): Promise<StoreStatistics> {
    return computeStoreStatistics(this.records);
  }
}

/** Clock that advances by `stepMs` on every read. */
export const steppingClock = (start: number, stepMs: number) => {
  let now = start - stepMs;
  return () => {
    now += stepMs;
    return now;
  };
};
