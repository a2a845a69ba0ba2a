import { errorMessage, InputDecodeError, SessionAlreadyEndedError } from '@/lib/errors';
import type { PostureSession } from '@/lib/session/postureSession';
import type { PostureSessionService } from '@/lib/session/service';
import {
  parseInboundMessage,
  toErrorMessage,
  toFrameResultMessage,
  type OutboundMessage,
} from './messages';

export type StreamState = 'connecting' | 'streaming' | 'closed';

/** The duplex channel a connection talks over (a WebSocket in production). */
export interface StreamTransport {
  send(message: OutboundMessage): void;
  close(code?: number, reason?: string): void;
}

const LOG_PREFIX = '[posture-stream]';

/**
 * One streaming client bound to one live session.
 * `receive` must be called with one message at a time; each call is a single
 * transition of the connection.
 */
export class PostureStreamConnection {
  private state: StreamState = 'connecting';
  private session: PostureSession | null = null;

  constructor(
    readonly sessionId: string,
    private readonly service: PostureSessionService,
    private readonly transport: StreamTransport,
  ) {}

  getState(): StreamState {
    return this.state;
  }

  open() {
    if (this.state !== 'connecting') {
      return;
    }

    const { session, created } = this.service.registry.getOrCreate(this.sessionId);
    this.session = session;
    this.service.registry.attachConnection(session);
    this.state = 'streaming';
    console.info(
      `${LOG_PREFIX} Connected ${this.sessionId}${created ? ' (new session)' : ''}`,
    );
  }

  async receive(raw: string): Promise<void> {
    if (this.state !== 'streaming') {
      return;
    }

    const parsed = parseInboundMessage(raw);
    if (!parsed.ok) {
      this.send(toErrorMessage(parsed.error));
      return;
    }

    const { message } = parsed;
    switch (message.type) {
      case 'ping':
        this.send({ type: 'pong' });
        return;
      case 'end_session':
        await this.close({ explicit: true });
        return;
      case 'frame':
        if (this.session) {
          await this.handleFrame(this.session, message.frame);
        }
        return;
    }
  }

  /** Transport went away. Treated as an implicit end of the session. */
  async disconnect(): Promise<void> {
    await this.close({ explicit: false });
  }

  private async handleFrame(session: PostureSession, frame: string) {
    try {
      const { analysis, statistics, timestamp } = await this.service.streamFrame(session, frame);
      this.send(toFrameResultMessage(analysis, statistics, timestamp));
    } catch (error) {
      if (!(error instanceof InputDecodeError || error instanceof SessionAlreadyEndedError)) {
        console.error(`${LOG_PREFIX} Frame failed for ${this.sessionId}:`, error);
      }
      this.send(toErrorMessage(errorMessage(error)));
    }
  }

  private async close({ explicit }: { explicit: boolean }) {
    if (this.state === 'closed') {
      return;
    }
    const wasStreaming = this.state === 'streaming';
    this.state = 'closed';

    const { session } = this;
    if (!session) {
      return;
    }
    if (wasStreaming) {
      this.service.registry.detachConnection(session);
    }

    // A dropped socket leaves the session to the other sockets still bound to it.
    const stillHeld =
      session.getState() === 'ended' || this.service.registry.hasConnection(session);
    if (!explicit && stillHeld) {
      console.info(`${LOG_PREFIX} Disconnected ${this.sessionId}`);
      return;
    }

    try {
      const { statistics, saved } = await this.service.endSession(this.sessionId, session);
      if (explicit) {
        this.transport.send({
          status: 'success',
          message: saved ? 'Session ended and saved' : 'Session ended but save failed',
          final_stats: statistics,
          saved_to_database: saved,
        });
      }
    } catch (error) {
      console.error(`${LOG_PREFIX} Could not end session ${this.sessionId}:`, error);
      if (explicit) {
        this.transport.send(toErrorMessage(errorMessage(error)));
      }
    }

    if (explicit) {
      this.transport.close(1000, 'Session ended');
    } else {
      console.info(`${LOG_PREFIX} Disconnected ${this.sessionId}`);
    }
  }

  private send(message: OutboundMessage) {
    if (this.state === 'streaming') {
      this.transport.send(message);
    }
  }
}
