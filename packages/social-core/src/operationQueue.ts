/**
 * Runs operations one at a time in arrival order. An operation that awaits keeps
 * the queue until it settles, so no other operation sees its intermediate state.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(operation: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(operation).finally(() => {
      this.pending -= 1;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  get depth() {
    return this.pending;
  }
}
