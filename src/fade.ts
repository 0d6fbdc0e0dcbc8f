export const FADE_STEPS = 20;
export const FADE_INTERVAL_MS = 30;

export interface FadeOptions {
  steps?: number;
  intervalMs?: number;
}

/**
 * Steps opacity from 0 up to `target`, one step per tick. The first step is
 * applied synchronously. Returns a function that stops the remaining steps.
 */
export function fadeIn(
  target: number,
  apply: (opacity: number) => void,
  options: FadeOptions = {},
): () => void {
  const steps = Math.max(1, options.steps ?? FADE_STEPS);
  const intervalMs = options.intervalMs ?? FADE_INTERVAL_MS;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let cancelled = false;

  const step = (index: number): void => {
    timer = null;
    if (cancelled) {
      return;
    }
    const fraction = Math.min(index / steps, 1);
    apply(target * fraction);
    if (fraction < 1) {
      timer = setTimeout(() => step(index + 1), intervalMs);
    }
  };

  step(0);

  return () => {
    cancelled = true;
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  };
}
