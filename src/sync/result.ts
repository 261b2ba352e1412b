import { SyncMode, SyncOutcome, SyncResult } from '../types/index.js';

/** Accumulates the outcome of one run. */
export class SyncResultBuilder {
  eventsCreated = 0;
  eventsUpdated = 0;
  eventsDeleted = 0;
  itemsSkipped = 0;
  deviceWrites = 0;
  readonly errorMessages: string[] = [];

  private readonly scope: string;
  private readonly mode: SyncMode;
  private readonly startedAt: Date;

  constructor(scope: string, mode: SyncMode, startedAt: Date) {
    this.scope = scope;
    this.mode = mode;
    this.startedAt = startedAt;
  }

  recordError(message: string): void {
    this.errorMessages.push(message);
  }

  build(outcome: SyncOutcome, finishedAt: Date): SyncResult {
    const totalChanges = this.eventsCreated + this.eventsUpdated + this.eventsDeleted;

    return Object.freeze({
      scope: this.scope,
      mode: this.mode,
      outcome,
      eventsCreated: this.eventsCreated,
      eventsUpdated: this.eventsUpdated,
      eventsDeleted: this.eventsDeleted,
      itemsSkipped: this.itemsSkipped,
      deviceWrites: this.deviceWrites,
      errorsEncountered: this.errorMessages.length,
      errorMessages: Object.freeze([...this.errorMessages]),
      syncTime: new Date(this.startedAt.getTime()),
      syncDurationMs: Math.max(0, finishedAt.getTime() - this.startedAt.getTime()),
      hasErrors: this.errorMessages.length > 0,
      hasChanges: totalChanges > 0,
      totalChanges,
    });
  }
}

export function formatSyncResult(result: SyncResult): string {
  return (
    `${result.mode} sync of ${result.scope} ${result.outcome}: ` +
    `created ${result.eventsCreated}, updated ${result.eventsUpdated}, deleted ${result.eventsDeleted}, ` +
    `skipped ${result.itemsSkipped}, errors ${result.errorsEncountered} (${result.syncDurationMs}ms)`
  );
}
