import { z } from 'zod';
import type { PostureAnalysis, PostureLabel } from '@/lib/posture/types';
import {
  condenseStatistics,
  type CondensedSessionStatistics,
  type FinalSessionStatistics,
  type SessionStatistics,
} from '@/lib/session/postureSession';

// ─── Inbound ──────────────────────────────────────────
export const inboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('frame'), frame: z.string() }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('end_session') }),
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type ParsedInbound =
  | { ok: true; message: InboundMessage }
  | { ok: false; error: string };

export const parseInboundMessage = (raw: string): ParsedInbound => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid JSON message' };
  }

  const parsed = inboundMessageSchema.safeParse(json);
  if (!parsed.success) {
    const type =
      typeof json === 'object' && json !== null && 'type' in json ? String(json.type) : undefined;
    return {
      ok: false,
      error: type ? `Unknown or malformed message type: ${type}` : 'Message type is required',
    };
  }
  return { ok: true, message: parsed.data };
};

// ─── Outbound ─────────────────────────────────────────
export interface WireMetrics {
  neck_angle: number;
  spine_tilt: number;
  shoulder_tilt: number;
  nose_shoulder_distance?: number;
}

export interface FrameResultMessage {
  status: 'success';
  posture_status: PostureLabel;
  posture_score: number;
  is_good_posture: boolean;
  timestamp: string;
  metrics?: WireMetrics;
  session_stats?: CondensedSessionStatistics;
}

export interface PongMessage {
  type: 'pong';
}

export interface ErrorMessage {
  status: 'error';
  message: string;
}

export interface SessionEndedMessage {
  status: 'success';
  message: string;
  final_stats: FinalSessionStatistics;
  saved_to_database: boolean;
}

export type OutboundMessage = FrameResultMessage | PongMessage | ErrorMessage | SessionEndedMessage;

/** Aggregate stats ride along with every Nth frame result. */
export const STATS_BROADCAST_INTERVAL = 10;

const round2 = (value: number) => Math.round(value * 100) / 100;

export const toWireMetrics = (
  analysis: PostureAnalysis,
  { includeDistance = false }: { includeDistance?: boolean } = {},
): WireMetrics | undefined => {
  if (analysis.kind === 'no_detection') {
    return undefined;
  }

  const { metrics } = analysis;
  return {
    neck_angle: round2(metrics.neckAngle),
    spine_tilt: round2(metrics.spineTilt),
    shoulder_tilt: round2(metrics.shoulderTilt),
    ...(includeDistance ? { nose_shoulder_distance: round2(metrics.noseShoulderDistance) } : {}),
  };
};

export const toFrameResultMessage = (
  analysis: PostureAnalysis,
  statistics: SessionStatistics,
  timestamp: number,
): FrameResultMessage => {
  const message: FrameResultMessage = {
    status: 'success',
    posture_status: analysis.label,
    posture_score: analysis.score,
    is_good_posture: analysis.isGoodPosture,
    timestamp: new Date(timestamp).toISOString(),
  };

  const metrics = toWireMetrics(analysis);
  if (metrics) {
    message.metrics = metrics;
  }

  if (statistics.total_frames > 0 && statistics.total_frames % STATS_BROADCAST_INTERVAL === 0) {
    message.session_stats = condenseStatistics(statistics);
  }

  return message;
};

export const toErrorMessage = (message: string): ErrorMessage => ({ status: 'error', message });
