export const LOGIN_ATTEMPT_LIMIT = 5;
export const LOGIN_ATTEMPT_WINDOW_MS = 60_000;

/**
 * Sliding-window counter of failed logins, kept in process memory and keyed by
 * client. Only failures are recorded; a successful login clears the key.
 */
export class LoginAttemptTracker {
  private readonly attempts = new Map<string, number[]>();

  constructor(
    private readonly limit = LOGIN_ATTEMPT_LIMIT,
    private readonly windowMs = LOGIN_ATTEMPT_WINDOW_MS
  ) {}

  private recent(key: string, now: number): number[] {
    const recent = (this.attempts.get(key) ?? []).filter((time) => now - time < this.windowMs);
    if (recent.length) {
      this.attempts.set(key, recent);
    } else {
      this.attempts.delete(key);
    }
    return recent;
  }

  isBlocked(key: string, now = Date.now()): boolean {
    return this.recent(key, now).length >= this.limit;
  }

  recordFailure(key: string, now = Date.now()): void {
    this.sweep(now);
    this.attempts.set(key, [...this.recent(key, now), now]);
  }

  // Drops clients whose latest failure has left the window.
  private sweep(now: number): void {
    for (const [key, times] of this.attempts) {
      if (now - Math.max(...times) >= this.windowMs) {
        this.attempts.delete(key);
      }
    }
  }

  get trackedClients(): number {
    return this.attempts.size;
  }

  reset(key: string): void {
    this.attempts.delete(key);
  }

  clear(): void {
    this.attempts.clear();
  }
}

export const loginAttempts = new LoginAttemptTracker();
