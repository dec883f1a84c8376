/**
 * 공통 이벤트 JSON Schema 정의
 *
 * 트래커 수집기 ↔ 위치 추정 엔진 ↔ 지도 UI 간 통신 프로토콜
 */

// ============================================
// 기본 타입
// ============================================

/** 트래커 상태 (조회 시점에 계산) */
export type TrackerStatus =
  | 'UNKNOWN'  // 아직 위치 확정 없음
  | 'ACTIVE'   // 최근 갱신됨
  | 'STALE';   // 타임아웃 초과

/** 위치 해석 방식 */
export type FixMethod =
  | 'MULTILATERATION' // 3개 이상 비콘 가중 최소제곱
  | 'BILATERATION'    // 비콘 2개 직선 보간
  | 'CENTROID';       // 퇴화 기하 대체 (역거리 가중 중심)

/** 칼만 운동 모델 */
export type MotionModel = 'CONSTANT_POSITION' | 'CONSTANT_VELOCITY';

/** 위치 이력 항목 [x, y, timestampMs] */
export type HistoryEntry = [number, number, number];

// ============================================
// 수집 입력 (Ingestion)
// ============================================

/** 탐지된 비콘 (정규화 후) */
export interface DetectedBeacon {
  /** 정규화된 비콘 키 (mac:... 또는 ibeacon:...) */
  beaconKey: string;
  macAddress: string | null;
  uuid: string | null;
  major: number | null;
  minor: number | null;
  rssi: number;
}

/** 트래커 보고 (정규화 후) */
export interface TrackerReport {
  trackerId: string;
  /** Unix ms (보고 자체의 측정 시각) */
  timestamp: number;
  detectedBeacons: DetectedBeacon[];
}

// ============================================
// 게시 출력 (Published state)
// ============================================

/** 마지막 원시 위치 해석 결과 */
export interface RawFixSnapshot {
  x: number;
  y: number;
  confidence: number;
  method: FixMethod;
  beaconCount: number;
}

/** 트래커별 처리 카운터 */
export interface TrackerCounters {
  reportsApplied: number;
  insufficientData: number;
  outOfOrderRejected: number;
  unknownBeacons: number;
  filterResets: number;
}

/** 외부 소비자에게 게시되는 트래커 상태 */
export interface TrackerStateSnapshot {
  trackerId: string;
  status: TrackerStatus;
  x: number | null;
  y: number | null;
  /** 서버 시각 (Unix ms) */
  lastUpdateTime: number;
  /** 보고 시각 (Unix ms) */
  lastKnownMeasurementTime: number | null;
  lastDetectedBeacons: DetectedBeacon[];
  positionHistory: HistoryEntry[];
  lastFix: RawFixSnapshot | null;
  counters: TrackerCounters;
}

// ============================================
// 엔진 → UI 이벤트
// ============================================

export interface InitialStateEvent {
  type: 'initial_state';
  timestamp: number;
  trackers: TrackerStateSnapshot[];
  beaconCount: number;
}

export interface TrackerUpdateEvent {
  type: 'tracker_update';
  timestamp: number;
  tracker: TrackerStateSnapshot;
}

export interface SnapshotEvent {
  type: 'snapshot';
  timestamp: number;
  trackers: TrackerStateSnapshot[];
}

export interface TrackerStateEvent {
  type: 'tracker_state';
  timestamp: number;
  tracker: TrackerStateSnapshot;
}

export interface ErrorEvent {
  type: 'error';
  code: number;
  message: string;
  timestamp: number;
  details?: Record<string, unknown>;
}

export type EngineToClientEvent =
  | InitialStateEvent
  | TrackerUpdateEvent
  | SnapshotEvent
  | TrackerStateEvent
  | ErrorEvent;

// ============================================
// UI → 엔진 명령
// ============================================

export interface GetSnapshotCommand {
  type: 'get_snapshot';
}

export interface GetTrackerCommand {
  type: 'get_tracker';
  tracker_id: string;
}

export type ClientToEngineCommand = GetSnapshotCommand | GetTrackerCommand;
