/**
 * 트래커별 보고 대기열
 *
 * 한 트래커의 보고는 한 번에 하나씩 순서대로 처리하고,
 * 처리 사이마다 이벤트 루프에 양보해 다른 트래커의 대기열이 진행되도록 한다.
 * 용량을 넘으면 정책에 따라 가장 오래된 보고 또는 새 보고를 폐기한다.
 */

import { TrackerReport } from '../../../../shared/schemas';
import { QueueOverflowPolicy } from '../../config/estimationConfig';
import { ReportOutcome } from './types';

interface PendingReport {
  report: TrackerReport;
  resolve: (outcome: ReportOutcome) => void;
}

export interface MailboxHandlers {
  /** 보고 처리 (예외를 던지지 않아야 함) */
  process: (report: TrackerReport) => ReportOutcome;
  /** 용량 초과로 폐기된 보고 */
  drop: (report: TrackerReport) => ReportOutcome;
  /** 대기열이 비었을 때 */
  idle?: () => void;
}

export class TrackerMailbox {
  private queue: PendingReport[] = [];
  private draining = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly capacity: number,
    private readonly policy: QueueOverflowPolicy,
    private readonly handlers: MailboxHandlers
  ) {}

  /** 대기 중인 보고 수 (처리 중인 보고 제외) */
  get size(): number {
    return this.queue.length;
  }

  get isIdle(): boolean {
    return !this.draining && this.queue.length === 0;
  }

  /**
   * 보고 추가
   */
  enqueue(report: TrackerReport): Promise<ReportOutcome> {
    return new Promise((resolve) => {
      if (this.queue.length >= this.capacity) {
        if (this.policy === 'DROP_NEWEST') {
          resolve(this.handlers.drop(report));
          return;
        }
        const oldest = this.queue.shift();
        if (oldest) {
          oldest.resolve(this.handlers.drop(oldest.report));
        }
      }

      this.queue.push({ report, resolve });
      this.schedule();
    });
  }

  /**
   * 대기열이 빌 때까지 대기
   */
  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = true;
    setImmediate(() => this.drainOne());
  }

  private drainOne(): void {
    const next = this.queue.shift();
    if (next) {
      next.resolve(this.handlers.process(next.report));
    }

    if (this.queue.length > 0) {
      setImmediate(() => this.drainOne());
      return;
    }

    this.draining = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
    this.handlers.idle?.();
  }
}
