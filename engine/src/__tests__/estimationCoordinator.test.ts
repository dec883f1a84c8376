/**
 * 위치 추정 조정기 테스트
 */

import { EstimationCoordinator } from '../core/coordinator/estimationCoordinator';
import { BeaconInput, BeaconRegistry } from '../core/registry/beaconRegistry';
import { createEstimationConfig, EstimationConfigInput } from '../config/estimationConfig';
import { EstimationErrorCode, InvalidConfigurationError } from '../core/errors';
import { EstimationEventLogger } from '../core/logging/logger';
import { macBeaconKey } from '../core/registry/beaconKey';
import { DetectedBeacon, TrackerReport, TrackerUpdateEvent } from '../../../shared/schemas';
import { Position2D } from '../core/estimation/types';

const TX_POWER = -59;
const PROPAGATION_FACTOR = 2;

const BEACONS: BeaconInput[] = [
  { macAddress: 'AA:00:00:00:00:01', uuid: null, major: null, minor: null, x: 0, y: 0, txPower: TX_POWER, name: 'A' },
  { macAddress: 'AA:00:00:00:00:02', uuid: null, major: null, minor: null, x: 10, y: 0, txPower: TX_POWER, name: 'B' },
  { macAddress: 'AA:00:00:00:00:03', uuid: null, major: null, minor: null, x: 0, y: 10, txPower: TX_POWER, name: 'C' },
];

/** 거리 d에서 관측될 RSSI (n = 2) */
function rssiAt(distance: number): number {
  return TX_POWER - 10 * PROPAGATION_FACTOR * Math.log10(distance);
}

function observation(mac: string, rssi: number): DetectedBeacon {
  return { beaconKey: macBeaconKey(mac), macAddress: mac, uuid: null, major: null, minor: null, rssi };
}

function observationsFor(target: Position2D, beacons: BeaconInput[] = BEACONS): DetectedBeacon[] {
  return beacons.map((beacon) =>
    observation(beacon.macAddress ?? '', rssiAt(Math.hypot(target.x - beacon.x, target.y - beacon.y)))
  );
}

function report(trackerId: string, timestamp: number, detectedBeacons: DetectedBeacon[]): TrackerReport {
  return { trackerId, timestamp, detectedBeacons };
}

describe('Estimation Coordinator', () => {
  let now: number;

  function createCoordinator(
    overrides: EstimationConfigInput = {},
    listener?: (event: TrackerUpdateEvent) => void
  ): EstimationCoordinator {
    const config = createEstimationConfig({ signalPropagationFactor: PROPAGATION_FACTOR, ...overrides });
    return new EstimationCoordinator(new BeaconRegistry(BEACONS), config, listener, { clock: () => now });
  }

  beforeEach(() => {
    now = 10_000;
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('processReport', () => {
    it('비콘 3개 보고로 위치를 확정하고 게시해야 함', () => {
      const events: TrackerUpdateEvent[] = [];
      const coordinator = createCoordinator({}, (event) => events.push(event));

      const outcome = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));

      expect(outcome.status).toBe('APPLIED');
      expect(outcome.method).toBe('MULTILATERATION');
      expect(outcome.filterReset).toBe(false);
      expect(outcome.tracker?.x).toBeCloseTo(3, 6);
      expect(outcome.tracker?.y).toBeCloseTo(4, 6);
      expect(outcome.tracker?.status).toBe('ACTIVE');
      expect(outcome.tracker?.lastUpdateTime).toBe(10_000);
      expect(outcome.tracker?.lastKnownMeasurementTime).toBe(1000);
      expect(outcome.tracker?.positionHistory).toHaveLength(1);
      expect(outcome.tracker?.positionHistory[0][2]).toBe(1000);

      expect(events).toHaveLength(1);
      expect(events[0].type).toBe('tracker_update');
      expect(events[0].tracker).toEqual(outcome.tracker);
      expect(coordinator.trackerCount).toBe(1);
    });

    it('이전 시각의 보고는 카운터만 증가시키고 게시하지 않아야 함', () => {
      const listener = jest.fn();
      const coordinator = createCoordinator({}, listener);
      coordinator.processReport(report('T-1', 2000, observationsFor({ x: 3, y: 4 })));
      const before = coordinator.getTrackerState('T-1');
      if (!before) throw new Error('트래커 없음');

      const outcome = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 8, y: 8 })));

      expect(outcome).toEqual({ status: 'REJECTED_OUT_OF_ORDER', trackerId: 'T-1', tracker: null });
      expect(coordinator.getTrackerState('T-1')).toEqual({
        ...before,
        counters: { ...before.counters, outOfOrderRejected: 1 },
      });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(coordinator.getErrorCounts()[EstimationErrorCode.OUT_OF_ORDER_REPORT]).toBe(1);
    });

    it('같은 시각의 보고는 허용해야 함', () => {
      const coordinator = createCoordinator();
      coordinator.processReport(report('T-1', 2000, observationsFor({ x: 3, y: 4 })));
      const outcome = coordinator.processReport(report('T-1', 2000, observationsFor({ x: 3, y: 4 })));
      expect(outcome.status).toBe('APPLIED');
    });

    it('비콘이 부족하면 마지막 위치를 유지해야 함', () => {
      const coordinator = createCoordinator();
      coordinator.processReport(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));

      now = 12_000;
      const outcome = coordinator.processReport(
        report('T-1', 2000, [observation('AA:00:00:00:00:01', rssiAt(2))])
      );

      expect(outcome.status).toBe('NO_FIX');
      const tracker = outcome.tracker;
      expect(tracker?.x).toBeCloseTo(3, 6);
      expect(tracker?.y).toBeCloseTo(4, 6);
      expect(tracker?.positionHistory).toHaveLength(1);
      expect(tracker?.lastKnownMeasurementTime).toBe(2000);
      expect(tracker?.lastUpdateTime).toBe(12_000);
      expect(tracker?.lastDetectedBeacons).toHaveLength(1);
      expect(tracker?.counters.insufficientData).toBe(1);
      expect(coordinator.getErrorCounts()[EstimationErrorCode.INSUFFICIENT_DATA]).toBe(1);
    });

    it('첫 보고부터 비콘이 부족하면 UNKNOWN이어야 함', () => {
      const coordinator = createCoordinator();
      const outcome = coordinator.processReport(report('T-1', 1000, []));

      expect(outcome.status).toBe('NO_FIX');
      expect(outcome.tracker?.status).toBe('UNKNOWN');
      expect(outcome.tracker?.x).toBeNull();
    });

    it('등록되지 않은 비콘 관측은 버리고 나머지로 계산해야 함', () => {
      const coordinator = createCoordinator();
      const observations = [...observationsFor({ x: 3, y: 4 }), observation('FF:FF:FF:FF:FF:FF', -40)];

      const outcome = coordinator.processReport(report('T-1', 1000, observations));

      expect(outcome.status).toBe('APPLIED');
      expect(outcome.tracker?.x).toBeCloseTo(3, 6);
      expect(outcome.tracker?.counters.unknownBeacons).toBe(1);
      expect(outcome.tracker?.lastDetectedBeacons).toHaveLength(4);
      expect(coordinator.getErrorCounts()[EstimationErrorCode.UNKNOWN_BEACON]).toBe(1);
    });

    it('유한하지 않은 RSSI 관측은 버려야 함', () => {
      const coordinator = createCoordinator();
      const observations = observationsFor({ x: 3, y: 4 });
      observations[2] = { ...observations[2], rssi: Number.NaN };

      const outcome = coordinator.processReport(report('T-1', 1000, observations));

      expect(outcome.status).toBe('APPLIED');
      expect(outcome.method).toBe('BILATERATION');
      expect(coordinator.getErrorCounts()[EstimationErrorCode.INVALID_RSSI]).toBe(1);
    });

    it('같은 비콘의 중복 관측은 RSSI 평균으로 합쳐야 함', () => {
      const coordinator = createCoordinator();
      const [a, b, c] = observationsFor({ x: 3, y: 4 });
      const observations = [
        { ...a, rssi: a.rssi - 3 },
        { ...a, rssi: a.rssi + 3 },
        b,
        c,
      ];

      const outcome = coordinator.processReport(report('T-1', 1000, observations));

      expect(outcome.method).toBe('MULTILATERATION');
      expect(outcome.tracker?.lastFix?.beaconCount).toBe(3);
      expect(outcome.tracker?.x).toBeCloseTo(3, 6);
      expect(outcome.tracker?.y).toBeCloseTo(4, 6);
    });

    it('연속 보고는 필터로 평활화해야 함', () => {
      const coordinator = createCoordinator();
      coordinator.processReport(report('T-1', 0, observationsFor({ x: 3, y: 4 })));
      const outcome = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 6, y: 2 })));

      const x = outcome.tracker?.x ?? Number.NaN;
      expect(x).toBeGreaterThan(3);
      expect(x).toBeLessThan(6);
      expect(outcome.tracker?.lastFix?.x).toBeCloseTo(6, 6);
      expect(outcome.tracker?.positionHistory).toHaveLength(2);
    });

    it('위치 갱신 이벤트에 추정 속도를 기록해야 함', () => {
      const logger = new EstimationEventLogger({ enabled: false });
      const logSpy = jest.spyOn(logger, 'log');
      const coordinator = new EstimationCoordinator(
        new BeaconRegistry(BEACONS),
        createEstimationConfig({ signalPropagationFactor: PROPAGATION_FACTOR }),
        undefined,
        { logger, clock: () => now }
      );

      coordinator.processReport(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));

      const updated = logSpy.mock.calls.map(([event]) => event).find((event) => event.event === 'position_updated');
      expect(updated).toEqual(expect.objectContaining({ tracker_id: 'T-1', velocity: { vx: 0, vy: 0 } }));
      expect(logger.getStats().positions_updated).toBe(1);
    });

    it('측정 간격이 길면 필터를 재초기화해야 함', () => {
      const coordinator = createCoordinator();
      coordinator.processReport(report('T-1', 0, observationsFor({ x: 3, y: 4 })));

      const outcome = coordinator.processReport(report('T-1', 300_001, observationsFor({ x: 6, y: 2 })));

      expect(outcome.filterReset).toBe(true);
      expect(outcome.tracker?.x).toBeCloseTo(6, 6);
      expect(outcome.tracker?.y).toBeCloseTo(2, 6);
      expect(outcome.tracker?.counters.filterResets).toBe(1);
    });

    it('일직선 비콘은 중심 대체로 처리하고 기록해야 함', () => {
      const line: BeaconInput[] = [0, 5, 10].map((x, i) => ({
        macAddress: `BB:00:00:00:00:0${i}`,
        uuid: null,
        major: null,
        minor: null,
        x,
        y: 0,
        txPower: TX_POWER,
        name: null,
      }));
      const coordinator = createCoordinator();
      coordinator.reloadRegistry(line);

      const outcome = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 4, y: 3 }, line)));

      expect(outcome.method).toBe('CENTROID');
      expect(outcome.tracker?.y).toBe(0);
      expect(coordinator.getErrorCounts()[EstimationErrorCode.DEGENERATE_GEOMETRY]).toBe(1);
    });

    it('트래커 상태는 서로 독립적이어야 함', () => {
      const coordinator = createCoordinator();
      coordinator.processReport(report('T-1', 5000, observationsFor({ x: 3, y: 4 })));
      const outcome = coordinator.processReport(report('T-2', 1000, observationsFor({ x: 6, y: 2 })));

      expect(outcome.status).toBe('APPLIED');
      expect(coordinator.getSnapshot().map((t) => t.trackerId)).toEqual(['T-1', 'T-2']);
      expect(coordinator.getTrackerState('T-1')?.x).toBeCloseTo(3, 6);
    });

    it('처리 중 예외는 해당 보고만 실패로 남겨야 함', () => {
      const registry = new BeaconRegistry(BEACONS);
      const coordinator = new EstimationCoordinator(
        registry,
        createEstimationConfig({ signalPropagationFactor: PROPAGATION_FACTOR }),
        undefined,
        { clock: () => now }
      );
      const spy = jest.spyOn(registry, 'snapshot').mockImplementationOnce(() => {
        throw new Error('boom');
      });

      const failed = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));
      const next = coordinator.processReport(report('T-2', 1000, observationsFor({ x: 3, y: 4 })));

      expect(failed).toEqual({ status: 'FAILED', trackerId: 'T-1', tracker: null, detail: 'boom' });
      expect(next.status).toBe('APPLIED');
      expect(spy).toHaveBeenCalledTimes(2);
      expect(coordinator.getErrorCounts()[EstimationErrorCode.PROCESSING_FAILURE]).toBe(1);
    });

    it('게시 콜백 오류는 상태 갱신을 되돌리지 않아야 함', () => {
      const coordinator = createCoordinator({}, () => {
        throw new Error('listener down');
      });

      const outcome = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));

      expect(outcome.status).toBe('APPLIED');
      expect(coordinator.getTrackerState('T-1')?.counters.reportsApplied).toBe(1);
    });

    it('갱신이 없으면 조회 시점에 STALE이어야 함', () => {
      const coordinator = createCoordinator();
      coordinator.processReport(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));

      expect(coordinator.getTrackerState('T-1', now + 30_000)?.status).toBe('ACTIVE');
      expect(coordinator.getTrackerState('T-1', now + 30_001)?.status).toBe('STALE');
      expect(coordinator.getTrackerState('T-9')).toBeNull();
    });
  });

  describe('reloadRegistry', () => {
    it('새 비콘 배치를 다음 보고부터 사용해야 함', () => {
      const coordinator = createCoordinator();
      const moved = BEACONS.map((beacon) => ({ ...beacon, x: beacon.x + 20 }));

      const snapshot = coordinator.reloadRegistry(moved);
      const outcome = coordinator.processReport(report('T-1', 1000, observationsFor({ x: 23, y: 4 }, moved)));

      expect(snapshot.version).toBe(2);
      expect(outcome.tracker?.x).toBeCloseTo(23, 6);
    });

    it('범위를 벗어난 전파 계수는 거부하고 기존 설정을 유지해야 함', () => {
      const coordinator = createCoordinator();

      expect(() => coordinator.reloadRegistry([], 7)).toThrow(InvalidConfigurationError);
      expect(coordinator.currentPropagationFactor).toBe(PROPAGATION_FACTOR);
      expect(coordinator.beaconCount).toBe(3);
    });

    it('전파 계수를 함께 교체할 수 있어야 함', () => {
      const coordinator = createCoordinator();
      coordinator.reloadRegistry(BEACONS, 3.0);
      expect(coordinator.currentPropagationFactor).toBe(3.0);
    });
  });

  describe('submit', () => {
    it('같은 트래커의 보고를 순서대로 처리해야 함', async () => {
      const coordinator = createCoordinator();

      const outcomes = await Promise.all([
        coordinator.submit(report('T-1', 1000, observationsFor({ x: 3, y: 4 }))),
        coordinator.submit(report('T-1', 2000, observationsFor({ x: 3, y: 4 }))),
        coordinator.submit(report('T-2', 1000, observationsFor({ x: 6, y: 2 }))),
        coordinator.submit(report('T-1', 3000, observationsFor({ x: 3, y: 4 }))),
      ]);

      expect(outcomes.map((o) => o.status)).toEqual(['APPLIED', 'APPLIED', 'APPLIED', 'APPLIED']);
      expect(coordinator.getTrackerState('T-1')?.counters.reportsApplied).toBe(3);
      expect(coordinator.getTrackerState('T-1')?.lastKnownMeasurementTime).toBe(3000);
    });

    it('DROP_OLDEST 정책은 가장 오래된 대기 보고를 폐기해야 함', async () => {
      const coordinator = createCoordinator({ queue: { capacity: 2, overflowPolicy: 'DROP_OLDEST' } });

      const outcomes = await Promise.all([1000, 2000, 3000].map((t) =>
        coordinator.submit(report('T-1', t, observationsFor({ x: 3, y: 4 })))
      ));

      expect(outcomes.map((o) => o.status)).toEqual(['DROPPED', 'APPLIED', 'APPLIED']);
      expect(coordinator.getErrorCounts()[EstimationErrorCode.QUEUE_OVERFLOW]).toBe(1);
    });

    it('DROP_NEWEST 정책은 새 보고를 폐기해야 함', async () => {
      const coordinator = createCoordinator({ queue: { capacity: 2, overflowPolicy: 'DROP_NEWEST' } });

      const outcomes = await Promise.all([1000, 2000, 3000].map((t) =>
        coordinator.submit(report('T-1', t, observationsFor({ x: 3, y: 4 })))
      ));

      expect(outcomes.map((o) => o.status)).toEqual(['APPLIED', 'APPLIED', 'DROPPED']);
      expect(coordinator.getTrackerState('T-1')?.lastKnownMeasurementTime).toBe(2000);
    });

    it('종료 시 대기 중인 보고를 마치고 새 보고는 거부해야 함', async () => {
      const coordinator = createCoordinator();

      const pending = coordinator.submit(report('T-1', 1000, observationsFor({ x: 3, y: 4 })));
      await coordinator.shutdown();

      expect((await pending).status).toBe('APPLIED');
      expect(coordinator.isAccepting).toBe(false);

      const rejected = await coordinator.submit(report('T-1', 2000, observationsFor({ x: 3, y: 4 })));
      expect(rejected).toEqual({ status: 'REJECTED_SHUTDOWN', trackerId: 'T-1', tracker: null });
      expect(coordinator.getTrackerState('T-1')?.lastKnownMeasurementTime).toBe(1000);
    });
  });
});
