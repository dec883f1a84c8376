/**
 * RSSI → 거리 추정
 *
 * 로그 거리 경로 손실 모델의 역함수:
 *   d = 10 ^ ((txPower - rssi) / (10 * n))
 *
 * 가중치는 추정 분산의 역수로 근사한다 (가까울수록 신뢰도 높음).
 */

import { DistanceEstimate, DistanceOptions } from './types';

export const DEFAULT_DISTANCE_OPTIONS: DistanceOptions = {
  maxDistance: 30,
  epsilon: 0.1,
};

/**
 * 단일 RSSI 샘플의 거리 추정
 */
export function estimateDistance(
  rssi: number,
  beacon: { txPower: number },
  propagationFactor: number,
  options: DistanceOptions = DEFAULT_DISTANCE_OPTIONS
): DistanceEstimate {
  const raw = Math.pow(10, (beacon.txPower - rssi) / (10 * propagationFactor));
  const clamped = raw > options.maxDistance;
  const distance = clamped ? options.maxDistance : raw;
  const effective = Math.max(distance, options.epsilon);

  return {
    distance,
    weight: 1 / (effective * effective),
    clamped,
  };
}

/**
 * RSSI 값 유효성 (유한한 숫자)
 */
export function isValidRssi(rssi: number): boolean {
  return Number.isFinite(rssi);
}
