/**
 * Interval set of claimed line numbers.
 */

type Interval = [start: number, end: number];

export class ClaimedLines {
  // Sorted, disjoint, non-adjacent closed intervals.
  private readonly intervals: Interval[] = [];

  /**
   * Index of the first interval whose end is >= line.
   */
  private lowerBound(line: number): number {
    let lo = 0;
    let hi = this.intervals.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const interval = this.intervals[mid];
      if (interval && interval[1] < line) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  has(line: number): boolean {
    const interval = this.intervals[this.lowerBound(line)];
    return interval !== undefined && interval[0] <= line;
  }

  add(line: number): void {
    this.addRange(line, line);
  }

  addRange(start: number, end: number): void {
    if (end < start) return;
    // Merge with every interval that overlaps or touches [start, end].
    const index = this.lowerBound(start - 1);
    let mergedStart = start;
    let mergedEnd = end;
    let removeCount = 0;
    for (let i = index; i < this.intervals.length; i++) {
      const interval = this.intervals[i];
      if (!interval || interval[0] > end + 1) break;
      mergedStart = Math.min(mergedStart, interval[0]);
      mergedEnd = Math.max(mergedEnd, interval[1]);
      removeCount++;
    }
    this.intervals.splice(index, removeCount, [mergedStart, mergedEnd]);
  }

  /**
   * Number of claimed lines.
   */
  get size(): number {
    return this.intervals.reduce((sum, [start, end]) => sum + end - start + 1, 0);
  }

  /**
   * Copy of the claimed intervals, in order.
   */
  ranges(): Interval[] {
    return this.intervals.map(([start, end]) => [start, end]);
  }
}
