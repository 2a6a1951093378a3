/** Manually advanced millisecond clock. */
export class FakeClock {
  constructor(public now = 1_000) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}
