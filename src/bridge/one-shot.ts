/**
 * Single-use handoff between the callback that produces an outcome and the
 * caller awaiting it.
 */
export class OneShot<T> {
  private readonly promise: Promise<T>;
  private settle: (value: T) => void = () => {};
  private fired = false;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.settle = resolve;
    });
  }

  get isFired(): boolean {
    return this.fired;
  }

  /**
   * Hand over the value. Firing twice is a programmer error.
   */
  fire(value: T): void {
    if (this.fired) {
      throw new Error('OneShot already fired');
    }
    this.fired = true;
    this.settle(value);
  }

  wait(): Promise<T> {
    return this.promise;
  }
}
