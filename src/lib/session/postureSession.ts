import { differenceInMilliseconds } from 'date-fns';
import { SessionAlreadyEndedError } from '@/lib/errors';
import type { PostureAnalysis, PostureLabel } from '@/lib/posture/types';

export type PostureSessionState = 'active' | 'ended';

export interface PostureHistoryEntry {
  timestamp: string;
  status: PostureLabel;
  score: number;
}

/** Snapshot of a live session, in wire (snake_case) form. */
export interface SessionStatistics {
  session_id: string;
  start_time: string;
  duration_seconds: number;
  total_frames: number;
  good_frames: number;
  bad_frames: number;
  good_percent: number;
  bad_percent: number;
  average_score: number;
  longest_bad_duration: number;
  current_bad_duration: number;
}

export interface FinalSessionStatistics extends SessionStatistics {
  end_time: string;
}

export type CondensedSessionStatistics = Pick<
  SessionStatistics,
  'total_frames' | 'good_percent' | 'bad_percent' | 'average_score' | 'current_bad_duration'
>;

const round2 = (value: number) => Math.round(value * 100) / 100;

const toIso = (timestamp: number) => new Date(timestamp).toISOString();

const secondsBetween = (from: number, to: number) => differenceInMilliseconds(to, from) / 1000;

export const condenseStatistics = (stats: SessionStatistics): CondensedSessionStatistics => ({
  total_frames: stats.total_frames,
  good_percent: stats.good_percent,
  bad_percent: stats.bad_percent,
  average_score: stats.average_score,
  current_bad_duration: stats.current_bad_duration,
});

export function createPostureSession(sessionId: string, startedAt: number = Date.now()) {
  let state: PostureSessionState = 'active';
  let totalFrames = 0;
  let goodFrames = 0;
  let badFrames = 0;
  let badRunStart: number | null = null;
  let currentBadDuration = 0;
  let longestBadDuration = 0;
  const scoreHistory: number[] = [];
  const postureHistory: PostureHistoryEntry[] = [];

  const assertActive = () => {
    if (state === 'ended') {
      throw new SessionAlreadyEndedError(sessionId);
    }
  };

  const update = (analysis: PostureAnalysis, timestamp: number = Date.now()) => {
    assertActive();

    totalFrames += 1;

    if (analysis.isGoodPosture) {
      goodFrames += 1;
      if (badRunStart !== null) {
        longestBadDuration = Math.max(longestBadDuration, currentBadDuration);
        badRunStart = null;
        currentBadDuration = 0;
      }
    } else {
      badFrames += 1;
      if (badRunStart === null) {
        badRunStart = timestamp;
      } else {
        currentBadDuration = secondsBetween(badRunStart, timestamp);
        longestBadDuration = Math.max(longestBadDuration, currentBadDuration);
      }
    }

    scoreHistory.push(analysis.score);
    postureHistory.push({
      timestamp: toIso(timestamp),
      status: analysis.label,
      score: analysis.score,
    });
  };

  const getStatistics = (now: number = Date.now()): SessionStatistics => {
    const goodPercent = totalFrames > 0 ? (goodFrames / totalFrames) * 100 : 0;
    const badPercent = totalFrames > 0 ? (badFrames / totalFrames) * 100 : 0;
    const averageScore =
      scoreHistory.length > 0
        ? scoreHistory.reduce((sum, score) => sum + score, 0) / scoreHistory.length
        : 0;

    return {
      session_id: sessionId,
      start_time: toIso(startedAt),
      duration_seconds: round2(secondsBetween(startedAt, now)),
      total_frames: totalFrames,
      good_frames: goodFrames,
      bad_frames: badFrames,
      good_percent: round2(goodPercent),
      bad_percent: round2(badPercent),
      average_score: round2(averageScore),
      longest_bad_duration: round2(longestBadDuration),
      current_bad_duration: round2(currentBadDuration),
    };
  };

  /** Irreversible. The returned snapshot is what gets persisted. */
  const end = (endedAt: number = Date.now()): FinalSessionStatistics => {
    assertActive();
    state = 'ended';
    return { ...getStatistics(endedAt), end_time: toIso(endedAt) };
  };

  return {
    id: sessionId,
    startedAt,
    update,
    getStatistics,
    end,
    getState: () => state,
    getPostureHistory: (): readonly PostureHistoryEntry[] => postureHistory,
    getScoreHistory: (): readonly number[] => scoreHistory,
  };
}

export type PostureSession = ReturnType<typeof createPostureSession>;
