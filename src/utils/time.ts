// src/utils/time.ts

export interface TimeSource {
  nowMs(): number;
  sleepMs(ms: number): Promise<void>;
}

export class RealTimeSource implements TimeSource {
  nowMs(): number {
    return Date.now();
  }

  async sleepMs(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
