/**
 * Mutex serializes critical sections on a promise chain. A section starts
 * only after every earlier section has settled, whether it resolved or threw.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(() => section());
    // errors belong to the caller of this section, not to the next one
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
