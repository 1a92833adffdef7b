import type { Clock } from '../../src/domain/clock.js';

export class ManualClock implements Clock {
  private current: Date;

  public constructor(start: Date | string = '2026-03-01T00:00:00.000Z') {
    this.current = new Date(start);
  }

  public now(): Date {
    return new Date(this.current);
  }

  public set(next: Date | string): void {
    this.current = new Date(next);
  }

  public advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }

  public advanceDays(days: number): void {
    this.advanceMinutes(days * 24 * 60);
  }
}
