/**
 * 고정 용량 위치 이력 (FIFO)
 */

import { HistoryEntry } from '../../../../shared/schemas';

export class PositionHistory {
  readonly capacity: number;
  private entries: HistoryEntry[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`이력 용량은 양의 정수여야 합니다: ${capacity}`);
    }
    this.capacity = capacity;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * 항목 추가 (용량 초과 시 가장 오래된 항목 제거)
   */
  push(x: number, y: number, timestamp: number): void {
    this.entries.push([x, y, timestamp]);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  latest(): HistoryEntry | null {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1] : null;
  }

  /**
   * 오래된 순서의 복사본
   */
  toArray(): HistoryEntry[] {
    return this.entries.map(([x, y, t]) => [x, y, t]);
  }
}
