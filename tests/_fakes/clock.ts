import type { Clock } from '../../src/types/domain';

export class ManualClock {
  private time: number;

  constructor(start = '2026-03-01T12:00:00.000Z') {
    this.time = new Date(start).getTime();
  }

  readonly now: Clock = () => new Date(this.time);

  advance(ms: number): void {
    this.time += ms;
  }
}
