import type { PoseDetector } from '@/lib/detector/poseDetector';
import { SessionAlreadyEndedError } from '@/lib/errors';
import type { DecodeFrameOptions } from '@/lib/frames/decodeFrame';
import { analyzeFrame } from '@/lib/posture/analyzer';
import type { PostureAnalysis } from '@/lib/posture/types';
import {
  toStoredSessionRecord,
  type SessionStore,
  type StoredSessionRow,
  type StoreStatistics,
} from '@/lib/store/sessionStore';
import type { FinalSessionStatistics, PostureSession, SessionStatistics } from './postureSession';
import { SessionRegistry } from './registry';

export interface PostureSessionServiceOptions {
  registry?: SessionRegistry;
  store: SessionStore;
  detector: PoseDetector;
  decode?: DecodeFrameOptions;
  clock?: () => number;
}

export interface FrameOutcome {
  analysis: PostureAnalysis;
  statistics: SessionStatistics;
  timestamp: number;
}

export interface EndedSession {
  statistics: FinalSessionStatistics;
  saved: boolean;
}

const LOG_PREFIX = '[posture-session]';

/**
 * Ties the live session registry to the frame pipeline and the session store.
 * Every mutation of a session runs under that session's lock.
 */
export class PostureSessionService {
  readonly registry: SessionRegistry;
  private readonly store: SessionStore;
  private readonly detector: PoseDetector;
  private readonly decodeOptions: DecodeFrameOptions;
  private readonly clock: () => number;

  constructor({ registry, store, detector, decode = {}, clock = Date.now }: PostureSessionServiceOptions) {
    this.registry = registry ?? new SessionRegistry();
    this.store = store;
    this.detector = detector;
    this.decodeOptions = decode;
    this.clock = clock;
  }

  startSession(): { sessionId: string; startTime: string } {
    const session = this.registry.create(undefined, this.clock());
    console.info(`${LOG_PREFIX} Started session ${session.id}`);
    return { sessionId: session.id, startTime: session.getStatistics(session.startedAt).start_time };
  }

  /** Request path: the session must already exist. */
  async analyzeSessionFrame(sessionId: string, input: string | Buffer): Promise<FrameOutcome> {
    this.registry.require(sessionId, 'Please start a session first.');

    return this.registry.runExclusive(sessionId, async () => {
      const session = this.registry.require(sessionId, 'Please start a session first.');
      return this.applyFrame(session, input);
    });
  }

  /**
   * Stream path: frames go to the session the connection was bound to on open.
   * Once that session has ended it never takes another frame, even if a new
   * session was started under the same id.
   */
  streamFrame(session: PostureSession, input: string | Buffer): Promise<FrameOutcome> {
    return this.registry.runExclusive(session.id, async () => {
      this.assertLive(session);
      return this.applyFrame(session, input);
    });
  }

  quickAnalyze(input: string | Buffer): Promise<PostureAnalysis> {
    return analyzeFrame(input, this.detector, this.decodeOptions);
  }

  getSessionStatus(sessionId: string): SessionStatistics {
    return this.registry.require(sessionId).getStatistics(this.clock());
  }

  listActiveSessions(): { session_id: string; statistics: SessionStatistics }[] {
    const now = this.clock();
    return this.registry.list().map((session) => ({
      session_id: session.id,
      statistics: session.getStatistics(now),
    }));
  }

  /**
   * Ends the session, removes it from the live set and hands the final
   * snapshot to the store. A failed write is reported through `saved`.
   * With `expected`, only that session instance is ended.
   */
  async endSession(sessionId: string, expected?: PostureSession): Promise<EndedSession> {
    if (!expected) {
      this.registry.require(sessionId);
    }

    return this.registry.runExclusive(sessionId, async () => {
      const session = expected ?? this.registry.require(sessionId);
      this.assertLive(session);
      const statistics = session.end(this.clock());
      this.registry.remove(sessionId);

      const saved = await this.persist(statistics);
      console.info(`${LOG_PREFIX} Ended session ${sessionId} (saved: ${saved})`);
      return { statistics, saved };
    });
  }

  getHistory(limit = 10): Promise<StoredSessionRow[]> {
    return this.store.recent(limit);
  }

  getOverallStatistics(): Promise<StoreStatistics> {
    return this.store.statistics();
  }

  deleteStoredSession(sessionId: string): Promise<boolean> {
    return this.store.deleteById(sessionId);
  }

  private assertLive(session: PostureSession) {
    if (session.getState() === 'ended' || this.registry.get(session.id) !== session) {
      throw new SessionAlreadyEndedError(session.id);
    }
  }

  private async applyFrame(session: PostureSession, input: string | Buffer): Promise<FrameOutcome> {
    const analysis = await analyzeFrame(input, this.detector, this.decodeOptions);

    const timestamp = this.clock();
    session.update(analysis, timestamp);

    return { analysis, statistics: session.getStatistics(timestamp), timestamp };
  }

  private async persist(statistics: FinalSessionStatistics): Promise<boolean> {
    try {
      await this.store.append(toStoredSessionRecord(statistics));
      return true;
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to save session ${statistics.session_id}:`, error);
      return false;
    }
  }
}
