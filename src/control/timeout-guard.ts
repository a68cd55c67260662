/** Largest delay setTimeout honours; anything above it fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface TimeoutGuard {
  /** Clears the timer. Returns false if it had already fired or been disarmed. */
  disarm(): boolean;
  readonly fired: boolean;
}

/** One-shot deadline for a running dispatch; disarm it when the dispatch settles. */
export function armTimeout(timeoutMs: number, onTimeout: () => void): TimeoutGuard {
  let active = true;
  let fired = false;

  const handle = setTimeout(() => {
    if (!active) return;
    active = false;
    fired = true;
    onTimeout();
  }, timeoutMs);

  return {
    disarm() {
      if (!active) return false;
      active = false;
      clearTimeout(handle);
      return true;
    },
    get fired() {
      return fired;
    },
  };
}
