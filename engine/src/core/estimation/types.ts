/**
 * 거리 추정 / 위치 해석 타입 정의
 */

import { FixMethod } from '../../../../shared/schemas';

/** 2D 위치 (m) */
export interface Position2D {
  x: number;
  y: number;
}

/** 거리 추정 결과 */
export interface DistanceEstimate {
  /** 추정 거리 (m) */
  distance: number;
  /** 가중치 (1 / d^2) */
  weight: number;
  /** maxDistance로 잘렸는지 여부 */
  clamped: boolean;
}

/** 거리 추정 옵션 */
export interface DistanceOptions {
  maxDistance: number;
  epsilon: number;
}

/** 위치 해석 입력 (비콘 하나) */
export interface RangeMeasurement {
  beaconId: string;
  position: Position2D;
  distance: number;
  weight: number;
}

/** 원시 위치 해석 결과 */
export interface PositionFix extends Position2D {
  /** 신뢰도 (0, 1] */
  confidence: number;
  /** 가중 RMS 잔차 (m) */
  residual: number;
  method: FixMethod;
  beaconCount: number;
  /** 퇴화 기하로 중심 대체가 일어났는지 */
  degenerate: boolean;
}

export type ResolveResult =
  | { ok: true; fix: PositionFix }
  | { ok: false; reason: 'INSUFFICIENT_DATA'; beaconCount: number };

/** 위치 해석 설정 */
export interface ResolverConfig {
  residualScale: number;
  degeneracyTolerance: number;
  bilaterationPenalty: number;
  centroidPenalty: number;
  /** 역거리 가중 중심의 최소 거리 (m) */
  epsilon: number;
}
