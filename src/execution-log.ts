import { v4 as uuidv4 } from 'uuid';
import { Action, ExecutionLogEntry, ExecutionOutcome } from './types';

/**
 * Append-only record of what one top-level command did
 */
export class ExecutionLog {
  readonly runId: string;
  private entries: ExecutionLogEntry[] = [];

  constructor(runId: string = uuidv4()) {
    this.runId = runId;
  }

  /**
   * Record the outcome of a parsed action
   */
  recordAction(action: Action, outcome: ExecutionOutcome, command?: string): ExecutionLogEntry {
    return this.append({ timestamp: new Date().toISOString(), command, action, outcome });
  }

  /**
   * Record an outcome for a work item, or for the command as a whole
   */
  recordItem(item: string, outcome: ExecutionOutcome): ExecutionLogEntry {
    return this.append({ timestamp: new Date().toISOString(), item, outcome });
  }

  recordCommand(command: string, outcome: ExecutionOutcome): ExecutionLogEntry {
    return this.append({ timestamp: new Date().toISOString(), command, outcome });
  }

  getEntries(): readonly ExecutionLogEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  private append(entry: ExecutionLogEntry): ExecutionLogEntry {
    const frozen = Object.freeze(entry);
    this.entries.push(frozen);
    return frozen;
  }
}
