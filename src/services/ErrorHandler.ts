// Error Handler - failure tracking for volume operations
import { EventEmitter } from 'events';

export interface FailureTracker {
  operationName: string;
  failureCount: number;
  lastFailure: Date | null;
  lastError: string | null;
  warningEmitted: boolean;
}

export interface FailureWarning {
  operationName: string;
  failureCount: number;
  message: string;
}

export interface RecordedFailure {
  message: string;
  troubleshooting?: string;
}

export class ErrorHandler extends EventEmitter {
  private failureTrackers: Map<string, FailureTracker> = new Map();
  private readonly warningThreshold: number;

  constructor(warningThreshold: number = 3) {
    super();
    this.warningThreshold = warningThreshold;
  }

  public recordFailure(operationName: string, error: RecordedFailure): void {
    let tracker = this.failureTrackers.get(operationName);

    if (!tracker) {
      tracker = {
        operationName,
        failureCount: 0,
        lastFailure: null,
        lastError: null,
        warningEmitted: false
      };
      this.failureTrackers.set(operationName, tracker);
    }

    tracker.failureCount++;
    tracker.lastFailure = new Date();
    tracker.lastError = error.message;

    // Log the error
    console.error(`[${operationName}] Error (count: ${tracker.failureCount}):`, error.message);
    if (error.troubleshooting) {
      console.error(`[${operationName}] Hint: ${error.troubleshooting}`);
    }
    this.emit('error_recorded', { operationName, error: error.message, count: tracker.failureCount });

    // Emit warning if threshold reached
    if (tracker.failureCount >= this.warningThreshold && !tracker.warningEmitted) {
      tracker.warningEmitted = true;
      const warning: FailureWarning = {
        operationName,
        failureCount: tracker.failureCount,
        message: `Operation "${operationName}" has failed ${tracker.failureCount} times`
      };
      this.emit('warning', warning);
    }
  }

  public recordSuccess(operationName: string): void {
    const tracker = this.failureTrackers.get(operationName);
    if (tracker) {
      tracker.failureCount = 0;
      tracker.warningEmitted = false;
    }
  }

  public getFailureCount(operationName: string): number {
    return this.failureTrackers.get(operationName)?.failureCount ?? 0;
  }

  public resetAllFailures(): void {
    this.failureTrackers.clear();
  }

  // Get all failure stats
  public getFailureStats(): FailureTracker[] {
    return Array.from(this.failureTrackers.values(), (tracker) => ({ ...tracker }));
  }
}
