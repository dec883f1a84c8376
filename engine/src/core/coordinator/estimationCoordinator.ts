/**
 * 위치 추정 조정기
 *
 * 보고 1건마다:
 * 1. 트래커 상태 조회/생성
 * 2. 순서 검사
 * 3. 비콘 조회 + 거리 추정 (레지스트리 스냅샷 1개로 고정)
 * 4. 위치 해석
 * 5. 칼만 갱신 + 이력 기록
 * 6. 갱신 상태 게시
 *
 * 트래커 간에는 대기열이 독립적으로 진행되고, 같은 트래커의 보고는 직렬화된다.
 * 보고 하나의 예외는 해당 보고 결과(FAILED)로만 남고 다른 트래커에 영향을 주지 않는다.
 */

import { DetectedBeacon, TrackerReport, TrackerStateSnapshot } from '../../../../shared/schemas';
import { EstimationConfig, validatePropagationFactor } from '../../config/estimationConfig';
import { Beacon, BeaconInput, BeaconRegistry, RegistrySnapshot } from '../registry/beaconRegistry';
import { identityKeys } from '../registry/beaconKey';
import { estimateDistance, isValidRssi } from '../estimation/distanceEstimator';
import { resolvePosition } from '../estimation/positionResolver';
import { RangeMeasurement, ResolverConfig } from '../estimation/types';
import { TrackerState, TrackerStateMachine, TrackerUpdateOutcome } from '../tracking/trackerState';
import { EstimationErrorCode, EstimationErrorLog } from '../errors';
import { EstimationEventLogger } from '../logging/logger';
import { TrackerMailbox } from './trackerMailbox';
import { ReportOutcome, TrackerUpdateListener } from './types';

export interface CoordinatorOptions {
  logger?: EstimationEventLogger;
  errorLog?: EstimationErrorLog;
  /** 서버 시각 (Unix ms) */
  clock?: () => number;
}

interface ResolvedObservations {
  ranges: RangeMeasurement[];
  dropped: number;
}

// ============================================
// 조정기 클래스
// ============================================

export class EstimationCoordinator {
  private readonly config: EstimationConfig;
  private readonly registry: BeaconRegistry;
  private readonly machine: TrackerStateMachine;
  private readonly resolverConfig: ResolverConfig;
  private readonly listener: TrackerUpdateListener | null;
  private readonly logger: EstimationEventLogger;
  private readonly errorLog: EstimationErrorLog;
  private readonly clock: () => number;

  private trackers: Map<string, TrackerState> = new Map();
  private mailboxes: Map<string, TrackerMailbox> = new Map();
  private propagationFactor: number;
  private accepting = true;

  constructor(
    registry: BeaconRegistry,
    config: EstimationConfig,
    listener?: TrackerUpdateListener,
    options: CoordinatorOptions = {}
  ) {
    this.registry = registry;
    this.config = config;
    this.machine = new TrackerStateMachine(config);
    this.resolverConfig = { ...config.resolver, epsilon: config.distance.epsilon };
    this.listener = listener ?? null;
    this.logger = options.logger ?? new EstimationEventLogger({ enabled: false });
    this.errorLog = options.errorLog ?? new EstimationErrorLog();
    this.clock = options.clock ?? Date.now;
    this.propagationFactor = config.signalPropagationFactor;
  }

  // ============================================
  // 보고 처리
  // ============================================

  /**
   * 보고 1건 동기 처리
   */
  processReport(report: TrackerReport, now: number = this.clock()): ReportOutcome {
    const { trackerId } = report;

    try {
      const state = this.getOrCreateState(trackerId, now);

      if (this.machine.isOutOfOrder(state, report)) {
        this.machine.rejectOutOfOrder(state);
        this.errorLog.record(EstimationErrorCode.OUT_OF_ORDER_REPORT, trackerId, {
          reportTime: report.timestamp,
          lastKnownMeasurementTime: state.lastKnownMeasurementTime,
        }, now);
        this.logger.log({
          timestamp: now,
          event: 'report_rejected',
          tracker_id: trackerId,
          report_time: report.timestamp,
          reason: EstimationErrorCode.OUT_OF_ORDER_REPORT,
        });
        return { status: 'REJECTED_OUT_OF_ORDER', trackerId, tracker: null };
      }

      // 보고 하나는 같은 레지스트리 스냅샷과 전파 계수로 처리
      const registry = this.registry.snapshot();
      const propagationFactor = this.propagationFactor;

      const { ranges, dropped } = this.resolveObservations(
        trackerId,
        report.detectedBeacons,
        registry,
        propagationFactor,
        now
      );
      const resolution = resolvePosition(ranges, this.resolverConfig);

      if (resolution.ok && resolution.fix.degenerate) {
        this.errorLog.record(EstimationErrorCode.DEGENERATE_GEOMETRY, trackerId, {
          beaconCount: resolution.fix.beaconCount,
        }, now);
      }

      const outcome = this.machine.apply(state, report, resolution, dropped, now);
      return this.finish(state, report, outcome, now);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.errorLog.record(EstimationErrorCode.PROCESSING_FAILURE, trackerId, { message }, now);
      console.error(`[Coordinator] 보고 처리 실패 (${trackerId}):`, message);
      return { status: 'FAILED', trackerId, tracker: null, detail: message };
    }
  }

  /**
   * 트래커 대기열에 보고 추가
   */
  submit(report: TrackerReport): Promise<ReportOutcome> {
    if (!this.accepting) {
      return Promise.resolve({
        status: 'REJECTED_SHUTDOWN',
        trackerId: report.trackerId,
        tracker: null,
      });
    }

    let mailbox = this.mailboxes.get(report.trackerId);
    if (!mailbox) {
      const trackerId = report.trackerId;
      mailbox = new TrackerMailbox(this.config.queue.capacity, this.config.queue.overflowPolicy, {
        process: (queued) => this.processReport(queued),
        drop: (queued) => this.dropReport(queued),
        idle: () => this.mailboxes.delete(trackerId),
      });
      this.mailboxes.set(trackerId, mailbox);
    }
    return mailbox.enqueue(report);
  }

  /**
   * 신규 보고 수신 중단 후 처리 중인 대기열 완료까지 대기
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    await Promise.all([...this.mailboxes.values()].map((mailbox) => mailbox.whenIdle()));
    console.log(`[Coordinator] 종료 완료 (트래커 ${this.trackers.size}개)`);
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  // ============================================
  // 조회
  // ============================================

  getTrackerState(trackerId: string, now: number = this.clock()): TrackerStateSnapshot | null {
    const state = this.trackers.get(trackerId);
    return state ? this.machine.toSnapshot(state, now) : null;
  }

  getSnapshot(now: number = this.clock()): TrackerStateSnapshot[] {
    return [...this.trackers.values()].map((state) => this.machine.toSnapshot(state, now));
  }

  get trackerCount(): number {
    return this.trackers.size;
  }

  get beaconCount(): number {
    return this.registry.size;
  }

  get currentPropagationFactor(): number {
    return this.propagationFactor;
  }

  getErrorCounts(): Partial<Record<EstimationErrorCode, number>> {
    return this.errorLog.getCounts();
  }

  // ============================================
  // 레지스트리 재로드
  // ============================================

  /**
   * 비콘 집합과 전파 계수 교체
   *
   * 검증 실패 시 예외를 던지고 기존 설정을 유지한다.
   */
  reloadRegistry(beacons: readonly BeaconInput[], propagationFactor?: number): RegistrySnapshot {
    const factor = propagationFactor === undefined
      ? this.propagationFactor
      : validatePropagationFactor(propagationFactor);

    const snapshot = this.registry.reload(beacons);
    this.propagationFactor = factor;

    this.logger.log({
      timestamp: this.clock(),
      event: 'registry_reloaded',
      version: snapshot.version,
      beacon_count: snapshot.size,
      propagation_factor: factor,
    });
    return snapshot;
  }

  // ============================================
  // 내부 처리
  // ============================================

  private getOrCreateState(trackerId: string, now: number): TrackerState {
    let state = this.trackers.get(trackerId);
    if (!state) {
      state = this.machine.createState(trackerId, now);
      this.trackers.set(trackerId, state);
      this.logger.log({ timestamp: now, event: 'tracker_created', tracker_id: trackerId });
    }
    return state;
  }

  /**
   * 관측 → 거리 측정 목록
   *
   * 같은 비콘의 중복 관측은 RSSI 평균으로 합친다.
   */
  private resolveObservations(
    trackerId: string,
    observations: readonly DetectedBeacon[],
    registry: RegistrySnapshot,
    propagationFactor: number,
    now: number
  ): ResolvedObservations {
    const grouped = new Map<string, { beacon: Beacon; rssiSum: number; count: number }>();
    let dropped = 0;

    for (const observation of observations) {
      if (!isValidRssi(observation.rssi)) {
        this.dropObservation(trackerId, observation, EstimationErrorCode.INVALID_RSSI, now);
        dropped++;
        continue;
      }

      const beacon = this.lookupBeacon(registry, observation);
      if (!beacon) {
        this.dropObservation(trackerId, observation, EstimationErrorCode.UNKNOWN_BEACON, now);
        dropped++;
        continue;
      }

      const entry = grouped.get(beacon.id);
      if (entry) {
        entry.rssiSum += observation.rssi;
        entry.count++;
      } else {
        grouped.set(beacon.id, { beacon, rssiSum: observation.rssi, count: 1 });
      }
    }

    const ranges: RangeMeasurement[] = [];
    for (const { beacon, rssiSum, count } of grouped.values()) {
      const estimate = estimateDistance(rssiSum / count, beacon, propagationFactor, this.config.distance);
      ranges.push({
        beaconId: beacon.id,
        position: { x: beacon.x, y: beacon.y },
        distance: estimate.distance,
        weight: estimate.weight,
      });
    }

    return { ranges, dropped };
  }

  private lookupBeacon(registry: RegistrySnapshot, observation: DetectedBeacon): Beacon | null {
    const direct = registry.lookup(observation.beaconKey);
    if (direct) return direct;

    for (const key of identityKeys(observation)) {
      const beacon = registry.lookup(key);
      if (beacon) return beacon;
    }
    return null;
  }

  private dropObservation(
    trackerId: string,
    observation: DetectedBeacon,
    reason: EstimationErrorCode.UNKNOWN_BEACON | EstimationErrorCode.INVALID_RSSI,
    now: number
  ): void {
    this.errorLog.record(reason, trackerId, { beaconKey: observation.beaconKey }, now);
    this.logger.log({
      timestamp: now,
      event: 'observation_dropped',
      tracker_id: trackerId,
      beacon_key: observation.beaconKey,
      reason,
    });
  }

  private dropReport(report: TrackerReport): ReportOutcome {
    const now = this.clock();
    this.errorLog.record(EstimationErrorCode.QUEUE_OVERFLOW, report.trackerId, {
      reportTime: report.timestamp,
    }, now);
    this.logger.log({
      timestamp: now,
      event: 'report_rejected',
      tracker_id: report.trackerId,
      report_time: report.timestamp,
      reason: EstimationErrorCode.QUEUE_OVERFLOW,
      detail: this.config.queue.overflowPolicy,
    });
    return { status: 'DROPPED', trackerId: report.trackerId, tracker: null };
  }

  /**
   * 결과 기록 + 게시
   */
  private finish(
    state: TrackerState,
    report: TrackerReport,
    outcome: TrackerUpdateOutcome,
    now: number
  ): ReportOutcome {
    const { trackerId } = state;

    if (outcome.status === 'REJECTED_OUT_OF_ORDER') {
      return { status: 'REJECTED_OUT_OF_ORDER', trackerId, tracker: null };
    }

    if (outcome.status === 'NO_FIX') {
      this.errorLog.record(EstimationErrorCode.INSUFFICIENT_DATA, trackerId, {
        beaconCount: outcome.beaconCount,
      }, now);
      this.logger.log({
        timestamp: now,
        event: 'no_fix',
        tracker_id: trackerId,
        report_time: report.timestamp,
        beacon_count: outcome.beaconCount,
      });
    } else {
      this.logger.log({
        timestamp: now,
        event: 'position_updated',
        tracker_id: trackerId,
        report_time: report.timestamp,
        raw: { x: outcome.fix.x, y: outcome.fix.y },
        smoothed: { x: state.x ?? outcome.fix.x, y: state.y ?? outcome.fix.y },
        uncertainty: this.machine.getUncertainty(state),
        velocity: this.machine.getVelocity(state),
        confidence: outcome.fix.confidence,
        method: outcome.fix.method,
        beacon_count: outcome.fix.beaconCount,
        filter_reset: outcome.reset,
      });
    }

    const snapshot = this.machine.toSnapshot(state, now);
    this.publish(snapshot, now);

    if (outcome.status === 'NO_FIX') {
      return { status: 'NO_FIX', trackerId, tracker: snapshot };
    }
    return {
      status: 'APPLIED',
      trackerId,
      tracker: snapshot,
      method: outcome.fix.method,
      filterReset: outcome.reset,
    };
  }

  private publish(tracker: TrackerStateSnapshot, now: number): void {
    if (!this.listener) return;
    try {
      this.listener({ type: 'tracker_update', timestamp: now, tracker });
    } catch (error) {
      // 게시 실패는 상태 갱신을 되돌리지 않음
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Coordinator] 상태 게시 실패 (${tracker.trackerId}):`, message);
    }
  }
}

export default EstimationCoordinator;
