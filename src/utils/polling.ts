import { Clock, KeyInput } from '../collaborators';
import { QuitSignal } from '../errors';

export function checkQuit(key: string | null, quitKey: string): void {
  if (key !== null && key === quitKey) {
    throw new QuitSignal(key);
  }
}

/**
 * Waits durationMs in tickMs polls, throwing QuitSignal on the quit key.
 * Other keys are consumed and ignored, so presses never shorten the wait.
 */
export async function holdFor(
  input: KeyInput,
  clock: Clock,
  durationMs: number,
  tickMs: number,
  quitKey: string
): Promise<void> {
  const start = clock.now();

  let elapsed = 0;
  while (elapsed < durationMs) {
    const key = await input.poll(Math.min(tickMs, durationMs - elapsed));
    checkQuit(key, quitKey);
    elapsed = clock.now() - start;
  }
}
