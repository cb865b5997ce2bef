import { BehaviorSubject, filter, firstValueFrom, of, timeout } from 'rxjs';
import type { Observable } from 'rxjs';
import type { Session, SessionResult, SessionState } from './types';
import type { Logger } from './logger';
import type { InstallationIdentity } from './installation';
import { endSessionApi, startSessionApi, type ApiContext } from './api';
import { ULinkError, errorMessageFromBody, failureMessage, toULinkError } from './errors';
import { readBoolean, readString } from './json';
import { Mutex } from './mutex';

const TAG = 'Session';
const DEFAULT_WAIT_TIMEOUT = 30000; // 30 seconds

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ['initializing'],
  initializing: ['active', 'failed'],
  active: ['ending'],
  ending: ['idle', 'failed'],
  failed: ['idle'],
};

export interface SessionManagerOptions {
  api: ApiContext;
  identity: InstallationIdentity;
  /** Request body for /sdk/sessions/start, given the caller's metadata */
  buildStartBody: (metadata?: Record<string, unknown>) => Promise<Record<string, unknown>>;
  logger: Logger;
  now?: () => number;
}

/**
 * Session state machine. Every transition runs under one mutex, so a start,
 * an end and a bootstrap-adopted session never interleave.
 */
export class SessionManager {
  private readonly state = new BehaviorSubject<SessionState>('idle');
  readonly state$: Observable<SessionState> = this.state.asObservable();

  private readonly mutex = new Mutex();
  private readonly now: () => number;
  private current: Session | null = null;
  private lastEnded: Session | null = null;
  private startPromise: Promise<SessionResult> | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  getState(): SessionState {
    return this.state.value;
  }

  getCurrentSessionId(): string | null {
    return this.current?.sessionId ?? null;
  }

  getCurrentSession(): Session | null {
    return this.current ? { ...this.current, state: this.state.value } : null;
  }

  getLastEndedSession(): Session | null {
    return this.lastEnded ? { ...this.lastEnded } : null;
  }

  hasActiveSession(): boolean {
    return this.state.value === 'active' && this.current !== null;
  }

  isInitializing(): boolean {
    return this.state.value === 'initializing';
  }

  /**
   * Start a session. Returns the current one when already active; concurrent
   * callers share the in-flight request.
   */
  startSession(metadata?: Record<string, unknown>): Promise<SessionResult> {
    if (this.hasActiveSession() && this.current) {
      return Promise.resolve({ success: true, sessionId: this.current.sessionId });
    }
    if (!this.startPromise) {
      this.startPromise = this.mutex
        .runExclusive(() => this.performStart(metadata))
        .finally(() => {
          this.startPromise = null;
        });
    }
    return this.startPromise;
  }

  /**
   * Take over the session the server opened during bootstrap
   */
  adoptSession(sessionId: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.state.value === 'active') {
        this.options.logger.debug(TAG, `Session already active, not adopting ${sessionId}`);
        return;
      }
      if (this.state.value === 'failed') {
        this.transition('idle');
      }
      const installationId = await this.options.identity.getOrCreateInstallationId();
      this.transition('initializing');
      this.current = { sessionId, installationId, startedAt: this.now(), state: 'active' };
      this.transition('active');
      this.options.logger.info(TAG, `Adopted session ${sessionId}`);
    });
  }

  /**
   * End the current session. Returns false when there is none or the server
   * call fails; failures are logged, never thrown.
   */
  endSession(): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const session = this.current;
      if (!session || this.state.value !== 'active') {
        return false;
      }

      this.transition('ending');
      this.current = null;
      const endedAt = this.now();
      const ended: Session = {
        ...session,
        endedAt,
        duration: endedAt - session.startedAt,
        state: 'ending',
      };
      this.lastEnded = ended;

      try {
        const body = await endSessionApi(this.options.api, session.sessionId);
        if (readBoolean(body, 'success') !== true) {
          throw new ULinkError({
            kind: 'SessionError',
            message: errorMessageFromBody(body, 'Session end was not successful'),
          });
        }
        this.transition('idle');
        ended.state = 'idle';
        this.options.logger.info(TAG, `Ended session ${session.sessionId}`);
        return true;
      } catch (error) {
        this.transition('failed');
        ended.state = 'failed';
        this.options.logger.error(TAG, `Failed to end session ${session.sessionId}`, error);
        return false;
      }
    });
  }

  /**
   * Wait until an in-flight start settles or the timeout passes, then report
   * whether a session is active. The timeout leaves the request and the state alone.
   */
  async waitForSession(timeoutMs: number = DEFAULT_WAIT_TIMEOUT): Promise<boolean> {
    const current = this.state.value;
    if (current === 'active') {
      return true;
    }
    if (current !== 'initializing') {
      return false;
    }

    await firstValueFrom(
      this.state.pipe(
        filter((state) => state !== 'initializing'),
        timeout({ first: timeoutMs, with: () => of(this.state.value) })
      ),
      { defaultValue: this.state.value }
    );
    return this.state.value === 'active';
  }

  dispose(): void {
    this.state.complete();
  }

  private async performStart(metadata?: Record<string, unknown>): Promise<SessionResult> {
    if (this.hasActiveSession() && this.current) {
      return { success: true, sessionId: this.current.sessionId };
    }

    try {
      if (this.state.value === 'failed') {
        this.transition('idle');
      }
      this.transition('initializing');
    } catch (error) {
      return { success: false, error: toULinkError(error).message };
    }

    try {
      const installationId = await this.options.identity.getOrCreateInstallationId();
      const body = await this.options.buildStartBody(metadata);
      const response = await startSessionApi(this.options.api, body);
      const sessionId = readBoolean(response, 'success') === true ? readString(response, 'sessionId') : undefined;

      if (!sessionId) {
        this.transition('failed');
        const error = errorMessageFromBody(response, 'Session start was not successful');
        this.options.logger.warn(TAG, error);
        return { success: false, error };
      }

      this.current = { sessionId, installationId, startedAt: this.now(), state: 'active' };
      this.transition('active');
      this.options.logger.info(TAG, `Started session ${sessionId}`);
      return { success: true, sessionId };
    } catch (error) {
      this.transition('failed');
      const failure = toULinkError(error);
      this.options.logger.error(TAG, 'Failed to start session', failure);
      return { success: false, error: failureMessage(failure) };
    }
  }

  private transition(to: SessionState): void {
    const from = this.state.value;
    if (!TRANSITIONS[from].includes(to)) {
      throw new ULinkError({ kind: 'SessionError', message: `Illegal session transition ${from} -> ${to}` });
    }
    this.options.logger.debug(TAG, `${from} -> ${to}`);
    this.state.next(to);
  }
}
