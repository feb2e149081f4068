/**
 * Process inputs with a bounded number of concurrent workers; results keep
 * the input order.
 */
export async function runWithConcurrency<TInput, TResult>(
  inputs: readonly TInput[],
  concurrency: number,
  worker: (input: TInput, index: number) => Promise<TResult>
): Promise<TResult[]> {
  if (inputs.length === 0) {
    return [];
  }
  const effective = Math.max(1, Math.min(concurrency, inputs.length));
  const results = new Array<TResult>(inputs.length);
  // Shared iterator: each runner pulls the next unclaimed entry
  const entries = inputs.entries();

  async function runner(): Promise<void> {
    for (const [index, input] of entries) {
      results[index] = await worker(input, index);
    }
  }

  await Promise.all(Array.from({ length: effective }, runner));
  return results;
}

/**
 * Serializes async sections: each call starts after the previous one settles.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get queued(): number {
    return this.pending;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
