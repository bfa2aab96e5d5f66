/**
 * Runs tasks for the same key one after another while tasks for different
 * keys run concurrently. Used to serialize a single user's turns so a slow
 * earlier turn cannot overwrite the thread id stored by a later one.
 */
export class TurnSerializer {
  private tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
