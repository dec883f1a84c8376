/**
 * 추정 이벤트 로그 스키마 정의
 *
 * 모든 이벤트는 이 스키마를 따라야 합니다.
 * JSONL 형식으로 1줄 1이벤트 저장됩니다.
 */

import { FixMethod } from '../../../../shared/schemas';
import { EstimationErrorCode } from '../errors';

// ============================================
// 기본 이벤트 인터페이스
// ============================================

export interface BaseEvent {
  timestamp: number;  // 서버 시각 (Unix ms)
  event: string;      // 이벤트 타입
}

// ============================================
// 세션 이벤트
// ============================================

export interface SessionStartEvent extends BaseEvent {
  event: 'session_start';
  beacon_count: number;
  propagation_factor: number;
  motion_model: string;
}

export interface SessionEndEvent extends BaseEvent {
  event: 'session_end';
  summary: EventLoggerStats;
}

export interface RegistryReloadedEvent extends BaseEvent {
  event: 'registry_reloaded';
  version: number;
  beacon_count: number;
  propagation_factor: number;
}

// ============================================
// 트래커 이벤트
// ============================================

export interface TrackerCreatedEvent extends BaseEvent {
  event: 'tracker_created';
  tracker_id: string;
}

export interface PositionUpdatedEvent extends BaseEvent {
  event: 'position_updated';
  tracker_id: string;
  report_time: number;
  raw: { x: number; y: number };
  smoothed: { x: number; y: number };
  uncertainty: { x: number; y: number } | null;
  /** 추정 속도 (m/s, 정지 모델이면 0) */
  velocity: { vx: number; vy: number } | null;
  confidence: number;
  method: FixMethod;
  beacon_count: number;
  filter_reset: boolean;
}

export interface ObservationDroppedEvent extends BaseEvent {
  event: 'observation_dropped';
  tracker_id: string;
  beacon_key: string;
  reason: EstimationErrorCode.UNKNOWN_BEACON | EstimationErrorCode.INVALID_RSSI;
}

export interface ReportRejectedEvent extends BaseEvent {
  event: 'report_rejected';
  tracker_id: string;
  report_time: number;
  reason: EstimationErrorCode;
  detail?: string;
}

export interface NoFixEvent extends BaseEvent {
  event: 'no_fix';
  tracker_id: string;
  report_time: number;
  beacon_count: number;
}

// ============================================
// 통합 타입
// ============================================

export type LogEvent =
  | SessionStartEvent
  | SessionEndEvent
  | RegistryReloadedEvent
  | TrackerCreatedEvent
  | PositionUpdatedEvent
  | ObservationDroppedEvent
  | ReportRejectedEvent
  | NoFixEvent;

export interface EventLoggerStats {
  trackers_created: number;
  positions_updated: number;
  no_fix: number;
  observations_dropped: number;
  reports_rejected: number;
  filter_resets: number;
}
