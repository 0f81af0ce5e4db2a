import type { ClockPort } from "../../src/infra/clock.js";

export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(startIso = "2026-10-01T10:00:00.000Z") {
    this.currentMs = Date.parse(startIso);
  }

  nowIso(): string {
    return new Date(this.currentMs).toISOString();
  }

  nowMs(): number {
    return this.currentMs;
  }

  advanceSeconds(seconds: number): void {
    this.currentMs += seconds * 1000;
  }

  advanceMs(ms: number): void {
    this.currentMs += ms;
  }

  set(iso: string): void {
    this.currentMs = Date.parse(iso);
  }
}
