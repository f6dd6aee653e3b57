import type { ProvisioningRecordRepository } from '../../repositories/types';
import type { Clock, ProvisioningRecord } from '../../types/domain';
import type { NotificationDispatcher } from './notificationDispatcher';

export interface ReminderSettings {
  /** Hours before expiry at which the buyer is reminded. Empty turns reminders off. */
  markHours: number[];
}

export interface ReminderStep {
  /** The mark to send now, if any. */
  send: number | null;
  /** When the record is due for its next check; null when no mark is left. */
  next: Date | null;
}

const HOUR_MS = 60 * 60 * 1000;

/** Unique positive marks, largest first. */
export const normalizeMarks = (hours: number[]): number[] =>
  [...new Set(hours.filter(hour => Number.isFinite(hour) && hour > 0))].sort((a, b) => b - a);

/**
 * Decides what a record due for a check gets at `now`. The mark sent is the
 * smallest one the remaining time has already passed, so a check that runs
 * late sends one reminder, not a burst of the skipped ones.
 */
export const planReminder = (record: ProvisioningRecord, marks: number[], now: Date): ReminderStep => {
  const expiresAt = record.expiresAt.getTime();
  const msLeft = expiresAt - now.getTime();
  if (msLeft <= 0 || marks.length === 0) {
    return { send: null, next: null };
  }

  const largest = marks[0];
  if (msLeft > largest * HOUR_MS) {
    return { send: null, next: new Date(expiresAt - largest * HOUR_MS) };
  }

  const passed = marks.filter(mark => mark * HOUR_MS >= msLeft);
  const mark = passed[passed.length - 1];
  const smaller = marks.find(candidate => candidate < mark);
  return {
    send: record.remindersSent.includes(mark) ? null : mark,
    next: smaller === undefined ? null : new Date(expiresAt - smaller * HOUR_MS),
  };
};

/**
 * Tells buyers ahead of time that a purchased credential is about to run out.
 * Each record carries its own schedule; the schedule is moved with a
 * compare-and-set before sending, so concurrent sweeps send a mark once.
 */
export class ExpiryReminderService {
  private readonly marks: number[];

  constructor(
    private readonly records: ProvisioningRecordRepository,
    private readonly dispatcher: NotificationDispatcher,
    private readonly clock: Clock,
    settings: ReminderSettings
  ) {
    this.marks = normalizeMarks(settings.markHours);
  }

  get enabled(): boolean {
    return this.marks.length > 0;
  }

  async findDue(limit: number): Promise<ProvisioningRecord[]> {
    if (!this.enabled) {
      return [];
    }
    return this.records.findReminderDue(this.clock(), limit);
  }

  /** @returns whether a reminder was delivered */
  async remind(record: ProvisioningRecord): Promise<boolean> {
    const expected = record.nextReminderAt;
    if (!expected) {
      return false;
    }

    const step = planReminder(record, this.marks, this.clock());
    const claimed = await this.records.claimReminder(record.recordId, expected, {
      remindersSent: step.send === null ? record.remindersSent : [...record.remindersSent, step.send],
      nextReminderAt: step.next,
    });
    if (!claimed || step.send === null) {
      return false;
    }
    return this.dispatcher.credentialExpiring(claimed, step.send);
  }
}
