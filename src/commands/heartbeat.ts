export interface Heartbeat {
  stop(): void;
}

/** Calls onTick with the elapsed milliseconds every intervalMs until stopped. */
export function startHeartbeat(intervalMs: number, onTick: (elapsedMs: number) => void): Heartbeat {
  const start = Date.now();
  const timer = setInterval(() => onTick(Date.now() - start), intervalMs);
  return {
    stop: () => clearInterval(timer),
  };
}

/** Runs fn with a heartbeat that is stopped however fn exits. */
export async function withHeartbeat<T>(
  intervalMs: number,
  onTick: (elapsedMs: number) => void,
  fn: () => Promise<T>
): Promise<T> {
  const heartbeat = startHeartbeat(intervalMs, onTick);
  try {
    return await fn();
  } finally {
    heartbeat.stop();
  }
}
