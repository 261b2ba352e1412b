import { Scope, SyncResult, SyncSettings } from '../types/index.js';
import { scopeKey } from '../cache/scope.js';
import { ConcurrentSyncRejectedError, safeErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** The parts of the engine the scheduler drives. */
export interface SchedulerTarget {
  getSettings(): Promise<SyncSettings>;
  isSyncRunning(scope: Scope): boolean;
  isSyncNeeded(scope: Scope): Promise<boolean>;
  performIncrementalSync(scope: Scope): Promise<SyncResult>;
}

export type TickOutcome = 'synced' | 'skipped-running' | 'skipped-disabled' | 'skipped-fresh' | 'rejected' | 'failed';

export interface SchedulerOptions {
  /** Check period in ms. Whether a tick syncs is decided by the configured auto-sync interval. */
  checkInterval?: number;
  onResult?: (result: SyncResult) => void;
  /** Keep the process alive while started. */
  keepAlive?: boolean;
}

/**
 * Soft schedule of incremental syncs. A tick that finds a run already active
 * for its scope is skipped rather than queued.
 */
export class AutoSyncScheduler {
  private readonly target: SchedulerTarget;
  private readonly scope: Scope;
  private readonly checkInterval: number;
  private readonly onResult: ((result: SyncResult) => void) | null;
  private readonly keepAlive: boolean;
  private timer: NodeJS.Timeout | null = null;
  private readonly pending = new Set<Promise<TickOutcome>>();

  constructor(target: SchedulerTarget, scope: Scope, options: SchedulerOptions = {}) {
    this.target = target;
    this.scope = scope;
    this.checkInterval = options.checkInterval ?? 60 * 1000;
    this.onResult = options.onResult ?? null;
    this.keepAlive = options.keepAlive ?? false;
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.checkInterval);
    if (!this.keepAlive) {
      this.timer.unref();
    }
    logger.info(`Auto-sync scheduler started for ${scopeKey(this.scope)}`);
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    logger.info(`Auto-sync scheduler stopped for ${scopeKey(this.scope)}`);
  }

  async tick(): Promise<TickOutcome> {
    const run = this.runTick();
    this.pending.add(run);
    try {
      return await run;
    } finally {
      this.pending.delete(run);
    }
  }

  /** Resolves once every tick in progress has finished. */
  async idle(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private async runTick(): Promise<TickOutcome> {
    const key = scopeKey(this.scope);

    if (this.target.isSyncRunning(this.scope)) {
      logger.debug(`Auto-sync tick for ${key} skipped: a sync is running`);
      return 'skipped-running';
    }

    try {
      const settings = await this.target.getSettings();
      if (!settings.enabled || !settings.autoSync) {
        return 'skipped-disabled';
      }

      if (!(await this.target.isSyncNeeded(this.scope))) {
        return 'skipped-fresh';
      }

      const result = await this.target.performIncrementalSync(this.scope);
      this.onResult?.(result);
      return 'synced';
    } catch (error) {
      if (error instanceof ConcurrentSyncRejectedError) {
        logger.debug(`Auto-sync tick for ${key} lost the race to another run`);
        return 'rejected';
      }

      logger.error(`Auto-sync tick for ${key} failed: ${safeErrorMessage(error)}`);
      return 'failed';
    }
  }
}
