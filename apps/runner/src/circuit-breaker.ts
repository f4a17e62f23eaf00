export type CircuitBreakerAction = "stop" | "cooldown";

export type CircuitBreakerConfig = {
  maxErrors: number;
  windowSeconds: number;
  cooldownSeconds: number;
  action: CircuitBreakerAction;
};

export type CircuitBreakerState = {
  consecutiveErrors: number;
  errorWindowStartAt: Date | null;
  lastErrorAt: Date | null;
  lastErrorMessage: string | null;
};

function emptyState(): CircuitBreakerState {
  return {
    consecutiveErrors: 0,
    errorWindowStartAt: null,
    lastErrorAt: null,
    lastErrorMessage: null
  };
}

/**
 * Windowed error counter for the bot loop. Tripping resets the window so a
 * cooldown starts counting from zero afterwards.
 */
export class CircuitBreaker {
  private current = emptyState();

  constructor(
    readonly config: CircuitBreakerConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  get state(): CircuitBreakerState {
    return this.current;
  }

  /** Counts one failure; returns true when it trips the breaker. */
  recordError(errorMessage: string): boolean {
    const now = this.now();
    const windowStart = this.current.errorWindowStartAt;
    const outsideWindow = !windowStart || now.getTime() - windowStart.getTime() > this.config.windowSeconds * 1000;

    const next: CircuitBreakerState = {
      consecutiveErrors: outsideWindow ? 1 : this.current.consecutiveErrors + 1,
      errorWindowStartAt: outsideWindow ? now : windowStart,
      lastErrorAt: now,
      lastErrorMessage: errorMessage
    };

    const tripped = next.consecutiveErrors >= this.config.maxErrors;
    this.current = tripped ? emptyState() : next;
    return tripped;
  }
}
