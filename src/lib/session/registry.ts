import { randomUUID } from 'node:crypto';
import { UnknownSessionError } from '@/lib/errors';
import { createPostureSession, type PostureSession } from './postureSession';

/**
 * Live sessions and open stream connections, keyed by session id.
 * One instance per process, handed to both the HTTP routes and the stream server.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, PostureSession>();
  private readonly connections = new Map<PostureSession, number>();
  private readonly locks = new Map<string, Promise<unknown>>();

  create(sessionId: string = randomUUID(), startedAt: number = Date.now()): PostureSession {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }
    const session = createPostureSession(sessionId, startedAt);
    this.sessions.set(sessionId, session);
    return session;
  }

  get(sessionId: string): PostureSession | undefined {
    return this.sessions.get(sessionId);
  }

  require(sessionId: string, hint?: string): PostureSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new UnknownSessionError(sessionId, hint);
    }
    return session;
  }

  getOrCreate(sessionId: string): { session: PostureSession; created: boolean } {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return { session: existing, created: false };
    }
    return { session: this.create(sessionId), created: true };
  }

  /** Returns true only for the call that actually removed the session. */
  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  list(): PostureSession[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Stream sockets bound to one session instance, not to its id. */
  attachConnection(session: PostureSession) {
    this.connections.set(session, (this.connections.get(session) ?? 0) + 1);
  }

  detachConnection(session: PostureSession) {
    const count = (this.connections.get(session) ?? 0) - 1;
    if (count > 0) {
      this.connections.set(session, count);
    } else {
      this.connections.delete(session);
    }
  }

  hasConnection(session: PostureSession): boolean {
    return this.connections.has(session);
  }

  /**
   * Runs `task` after every task previously queued for the same id has settled.
   * Different ids never wait on each other.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(sessionId, tail);
    void tail.then(() => {
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    });
    return run;
  }
}
