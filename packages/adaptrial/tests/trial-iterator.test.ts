import { describe, expect, it } from 'vitest';
import { TrialIterator } from '../src/trial-iterator';

// Test implementation that returns values in a predictable pattern
class PredictableTrialIterator extends TrialIterator<number> {
  finished = false;
  private count = 0;

  constructor(private maxCount: number) {
    super();
  }

  advance() {
    if (this.count < this.maxCount) return ++this.count;
    this.finished = true;
    return;
  }
  hasNext() {
    return this.count < this.maxCount;
  }
  peek(n = 1) {
    const value = this.count + n;
    return value >= 1 && value <= this.maxCount ? value : undefined;
  }
}

describe('TrialIterator (abstract class behavior)', () => {
  it('should keep signaling the end after it is done', () => {
    const iterator = new PredictableTrialIterator(1);

    expect(iterator.next()).toEqual({ value: 1, done: false });
    expect(iterator.next()).toEqual({ value: undefined, done: true });
    expect(iterator.next()).toEqual({ value: undefined, done: true });
    expect(iterator.advance()).toBeUndefined();
  });

  it('should drive a for...of loop through advance', () => {
    const iterator = new PredictableTrialIterator(3);

    const values: number[] = [];
    for (const value of iterator) {
      values.push(value);
    }

    expect(values).toEqual([1, 2, 3]);
    expect(iterator.finished).toBe(true);
  });

  it('should not restart once exhausted', () => {
    const iterator = new PredictableTrialIterator(2);

    expect(Array.from(iterator)).toEqual([1, 2]);
    expect(Array.from(iterator)).toEqual([]);
  });

  it('should continue where manual iteration stopped', () => {
    const iterator = new PredictableTrialIterator(3);

    expect(iterator.advance()).toBe(1);
    expect(iterator.peek()).toBe(2);
    expect(Array.from(iterator)).toEqual([2, 3]);
  });
});
