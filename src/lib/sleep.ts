/**
 * Resolves after `time` milliseconds
 *
 * ```typescript
 * await sleep(25);
 * ```
 */
export async function sleep(time: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, time);
  });
}
