/**
 * Runs async operations one at a time, in submission order.
 *
 * Each operation starts only after the previous one has settled, so two
 * calls on the same endpoint never interleave across an await.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation, operation);
    // The chain only orders work; each caller observes its own failure via `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
