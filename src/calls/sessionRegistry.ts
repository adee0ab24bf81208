import { CallControlError } from '../errors';
import { log } from '../log';
import type { CallSession } from './callSession';

/**
 * Holds the single call slot and the lock that serialises every state change.
 * Reads of the slot never wait on the lock.
 */
export class SessionRegistry {
  private current: CallSession | null = null;
  private lastEnded: CallSession | null = null;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /**
   * Runs `task` after every previously submitted task has settled. A failing
   * task rejects only its own promise.
   */
  public runExclusive<T>(name: string, task: () => Promise<T> | T): Promise<T> {
    this.queued += 1;
    if (this.queued > 1) {
      log.debug({ event: 'session_lock_wait', task: name, queued: this.queued }, 'waiting for session lock');
    }

    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => {
        this.queued -= 1;
      },
      () => {
        this.queued -= 1;
      },
    );
    return result;
  }

  /** Takes the slot for a new session; fails SessionBusy when it is occupied. */
  public claim(session: CallSession): void {
    if (this.current) {
      throw new CallControlError('SessionBusy', 'another call is already active', {
        active_call_id: this.current.id,
      });
    }
    this.current = session;
  }

  public release(session: CallSession): void {
    if (this.current !== session) {
      return;
    }
    this.current = null;
    this.lastEnded = session;
  }

  public getCurrent(): CallSession | null {
    return this.current;
  }

  public getLastEnded(): CallSession | null {
    return this.lastEnded;
  }

  public isBusy(): boolean {
    return this.current !== null;
  }
}
