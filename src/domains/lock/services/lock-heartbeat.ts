import type { RenewLockResult } from '../model/lock.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('lock-heartbeat');

export type HeartbeatLoss =
  | { kind: 'not_holder' | 'expired' | 'permission_denied' }
  | { kind: 'error'; error: unknown };

export interface LockHeartbeatOptions {
  resourceId: string;
  /** Use the interval returned with the grant (a third of the TTL). */
  intervalMs: number;
  renew: () => Promise<RenewLockResult>;
  /** Called once, as soon as a renew fails. The heartbeat is stopped by then. */
  onLost: (loss: HeartbeatLoss) => void;
  onRenewed?: (expiresAt: number) => void;
}

/**
 * Keeps an editing session's lock alive by renewing on a fixed interval.
 * A failed renew is reported immediately so autosave can warn the editor
 * before unsaved work is at risk.
 */
export class LockHeartbeat {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;

  constructor(private readonly opts: LockHeartbeatOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.beat();
    }, this.opts.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async beat(): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    try {
      const result = await this.opts.renew();
      if (!this.running) return;
      if (result.kind === 'granted') {
        this.opts.onRenewed?.(result.expiresAt);
        return;
      }
      this.lose({ kind: result.kind });
    } catch (error) {
      if (this.running) {
        this.lose({ kind: 'error', error });
      }
    } finally {
      this.inFlight = false;
    }
  }

  private lose(loss: HeartbeatLoss): void {
    this.stop();
    log.warn({ resourceId: this.opts.resourceId, loss: loss.kind }, 'edit lock lost');
    this.opts.onLost(loss);
  }
}
