export interface ClockPort {
  nowIso(): string;
  nowMs(): number;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }

  nowMs(): number {
    return Date.now();
  }
}

export function addSeconds(iso: string, seconds: number): string {
  return new Date(Date.parse(iso) + seconds * 1000).toISOString();
}
