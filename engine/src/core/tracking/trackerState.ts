/**
 * 트래커 상태 머신
 *
 * 상태 전이:
 *   UNKNOWN (위치 없음) → ACTIVE (위치 1회 이상) → STALE (조회 시점 타임아웃, 저장하지 않음)
 *   → ACTIVE (다음 위치 확정). 측정 간격이 hardResetMs를 넘으면 필터를 원시 위치로 재초기화한다.
 *
 * 보고 1건 처리 순서:
 * 1. 순서 검사 (보고 시각 < 마지막 측정 시각이면 거부, 카운터만 증가)
 * 2. (호출 측) 거리 추정 + 위치 해석
 * 3. 해석 실패 시 탐지 비콘만 기록하고 위치/필터 유지
 * 4. 칼만 예측 + 업데이트
 * 5. 이력 추가
 * 6. 서버 시각 / 측정 시각 갱신
 */

import {
  DetectedBeacon,
  RawFixSnapshot,
  TrackerCounters,
  TrackerReport,
  TrackerStateSnapshot,
  TrackerStatus,
} from '../../../../shared/schemas';
import { PositionFix, ResolveResult } from '../estimation/types';
import { KalmanState, PositionKalmanFilter } from './kalmanFilter';
import { PositionHistory } from './positionHistory';
import { EstimationConfig } from '../../config/estimationConfig';

// ============================================
// 타입 정의
// ============================================

/**
 * 트래커 상태 (트래커 갱신 경로에서만 변경)
 */
export interface TrackerState {
  trackerId: string;
  x: number | null;
  y: number | null;
  /** 서버 시각 (Unix ms) */
  lastUpdateTime: number;
  /** 보고 시각 (Unix ms) */
  lastKnownMeasurementTime: number | null;
  lastDetectedBeacons: DetectedBeacon[];
  history: PositionHistory;
  kalman: KalmanState | null;
  lastFix: RawFixSnapshot | null;
  counters: TrackerCounters;
}

export type TrackerUpdateOutcome =
  | { status: 'APPLIED'; fix: PositionFix; reset: boolean }
  | { status: 'NO_FIX'; reason: 'INSUFFICIENT_DATA'; beaconCount: number }
  | { status: 'REJECTED_OUT_OF_ORDER'; lastKnownMeasurementTime: number };

function copyBeacons(beacons: readonly DetectedBeacon[]): DetectedBeacon[] {
  return beacons.map((beacon) => ({ ...beacon }));
}

// ============================================
// 상태 머신 클래스
// ============================================

export class TrackerStateMachine {
  private readonly filter: PositionKalmanFilter;
  private readonly historyCapacity: number;
  private readonly staleTimeoutMs: number;
  private readonly hardResetMs: number;

  constructor(config: EstimationConfig) {
    this.filter = new PositionKalmanFilter(config.kalman);
    this.historyCapacity = config.tracker.historyCapacity;
    this.staleTimeoutMs = config.tracker.staleTimeoutMs;
    this.hardResetMs = config.tracker.hardResetMs;
  }

  /**
   * 신규 트래커 상태 생성 (첫 보고 시)
   */
  createState(trackerId: string, now: number): TrackerState {
    return {
      trackerId,
      x: null,
      y: null,
      lastUpdateTime: now,
      lastKnownMeasurementTime: null,
      lastDetectedBeacons: [],
      history: new PositionHistory(this.historyCapacity),
      kalman: null,
      lastFix: null,
      counters: {
        reportsApplied: 0,
        insufficientData: 0,
        outOfOrderRejected: 0,
        unknownBeacons: 0,
        filterResets: 0,
      },
    };
  }

  /**
   * 순서 검사 (동일 시각 중복은 허용)
   */
  isOutOfOrder(state: TrackerState, report: TrackerReport): boolean {
    return state.lastKnownMeasurementTime !== null && report.timestamp < state.lastKnownMeasurementTime;
  }

  /**
   * 순서 위반 보고 거부 (카운터 외에는 변경하지 않음)
   */
  rejectOutOfOrder(state: TrackerState): TrackerUpdateOutcome {
    state.counters.outOfOrderRejected++;
    return {
      status: 'REJECTED_OUT_OF_ORDER',
      lastKnownMeasurementTime: state.lastKnownMeasurementTime ?? 0,
    };
  }

  /**
   * 위치 해석 결과 반영
   *
   * @param droppedObservations 레지스트리에서 찾지 못한 관측 수
   */
  apply(
    state: TrackerState,
    report: TrackerReport,
    resolution: ResolveResult,
    droppedObservations: number,
    now: number
  ): TrackerUpdateOutcome {
    if (this.isOutOfOrder(state, report)) {
      return this.rejectOutOfOrder(state);
    }

    state.counters.unknownBeacons += droppedObservations;
    state.lastDetectedBeacons = copyBeacons(report.detectedBeacons);
    state.lastUpdateTime = Math.max(state.lastUpdateTime, now);
    state.lastKnownMeasurementTime = report.timestamp;

    if (!resolution.ok) {
      state.counters.insufficientData++;
      return { status: 'NO_FIX', reason: resolution.reason, beaconCount: resolution.beaconCount };
    }

    const { fix } = resolution;
    const previous = state.kalman;
    const reset = previous === null || report.timestamp - previous.lastUpdateTime > this.hardResetMs;

    if (reset) {
      state.kalman = this.filter.createInitialState(fix, report.timestamp, fix.confidence);
      if (previous !== null) {
        state.counters.filterResets++;
      }
    } else {
      state.kalman = this.filter.step(previous, fix, fix.confidence, report.timestamp);
    }

    const position = this.filter.getPosition(state.kalman);
    state.x = position.x;
    state.y = position.y;
    state.history.push(position.x, position.y, report.timestamp);
    state.lastFix = {
      x: fix.x,
      y: fix.y,
      confidence: fix.confidence,
      method: fix.method,
      beaconCount: fix.beaconCount,
    };
    state.counters.reportsApplied++;

    return { status: 'APPLIED', fix, reset: reset && previous !== null };
  }

  /**
   * 조회 시점 상태 분류
   */
  classify(state: TrackerState, now: number): TrackerStatus {
    if (state.x === null || state.y === null) return 'UNKNOWN';
    if (now - state.lastUpdateTime > this.staleTimeoutMs) return 'STALE';
    return 'ACTIVE';
  }

  /**
   * 외부 게시용 스냅샷 (깊은 복사)
   */
  toSnapshot(state: TrackerState, now: number): TrackerStateSnapshot {
    return {
      trackerId: state.trackerId,
      status: this.classify(state, now),
      x: state.x,
      y: state.y,
      lastUpdateTime: state.lastUpdateTime,
      lastKnownMeasurementTime: state.lastKnownMeasurementTime,
      lastDetectedBeacons: copyBeacons(state.lastDetectedBeacons),
      positionHistory: state.history.toArray(),
      lastFix: state.lastFix ? { ...state.lastFix } : null,
      counters: { ...state.counters },
    };
  }

  /**
   * 현재 추정 속도 (필터 없으면 null)
   */
  getVelocity(state: TrackerState): { vx: number; vy: number } | null {
    return state.kalman ? this.filter.getVelocity(state.kalman) : null;
  }

  /**
   * 현재 위치 불확실성 (필터 없으면 null)
   */
  getUncertainty(state: TrackerState): { x: number; y: number } | null {
    return state.kalman ? this.filter.getPositionUncertainty(state.kalman) : null;
  }
}
