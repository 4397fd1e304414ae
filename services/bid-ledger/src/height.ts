import type { HeightSource } from './types.js';

/**
 * Height source driven by hand: the host advances it once per ordered step,
 * tests pin it to whatever height a scenario needs.
 */
export class ManualHeightSource implements HeightSource {
  private height: number;

  constructor(start = 0) {
    assertHeight(start);
    this.height = start;
  }

  currentHeight(): number {
    return this.height;
  }

  advance(by = 1): number {
    assertHeight(by);
    this.height += by;
    return this.height;
  }

  set(height: number): void {
    assertHeight(height);
    if (height < this.height) {
      throw new RangeError(
        `Height must not decrease (current ${this.height}, requested ${height})`
      );
    }
    this.height = height;
  }
}

function assertHeight(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Height must be a non-negative safe integer, got ${value}`);
  }
}
