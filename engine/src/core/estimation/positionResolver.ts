/**
 * 위치 해석 (다변측량)
 *
 * 알고리즘:
 * 1. 비콘 2개 미만: INSUFFICIENT_DATA
 * 2. 비콘 2개: 두 비콘을 잇는 직선 위에서 가중 잔차 제곱합 최소점
 * 3. 비콘 3개 이상: 기준 방정식을 빼서 선형화한 뒤 가중 최소제곱
 *    - 기하가 퇴화(일직선/겹침)하면 역거리 가중 중심으로 대체
 *
 * 결과 신뢰도는 가중 RMS 잔차에서 계산하며, 추적기는 이를 관측 노이즈 스케일에 사용한다.
 */

import {
  Position2D,
  PositionFix,
  RangeMeasurement,
  ResolveResult,
  ResolverConfig,
} from './types';
import { FixMethod } from '../../../../shared/schemas';

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  residualScale: 1.0,
  degeneracyTolerance: 1e-6,
  bilaterationPenalty: 0.5,
  centroidPenalty: 0.25,
  epsilon: 0.1,
};

// ============================================
// 유틸리티 함수
// ============================================

function isUsable(range: RangeMeasurement): boolean {
  return (
    Number.isFinite(range.position.x) &&
    Number.isFinite(range.position.y) &&
    Number.isFinite(range.distance) &&
    range.distance >= 0 &&
    Number.isFinite(range.weight) &&
    range.weight > 0
  );
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 가중 RMS 잔차: sqrt(Σ w (|p - b| - d)^2 / Σ w)
 */
export function weightedResidual(position: Position2D, ranges: readonly RangeMeasurement[]): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const range of ranges) {
    const r = Math.hypot(position.x - range.position.x, position.y - range.position.y) - range.distance;
    weighted += range.weight * r * r;
    totalWeight += range.weight;
  }
  return totalWeight > 0 ? Math.sqrt(weighted / totalWeight) : 0;
}

function buildFix(
  position: Position2D,
  ranges: readonly RangeMeasurement[],
  method: FixMethod,
  penalty: number,
  config: ResolverConfig
): PositionFix {
  const residual = weightedResidual(position, ranges);
  return {
    x: position.x,
    y: position.y,
    residual,
    confidence: penalty / (1 + residual / config.residualScale),
    method,
    beaconCount: ranges.length,
    degenerate: method === 'CENTROID',
  };
}

// ============================================
// 해석 방식
// ============================================

/**
 * 역거리 가중 중심 (퇴화 기하 대체)
 */
export function weightedCentroid(ranges: readonly RangeMeasurement[], epsilon: number): Position2D {
  let sumX = 0;
  let sumY = 0;
  let sumW = 0;
  for (const range of ranges) {
    const w = 1 / Math.max(range.distance, epsilon);
    sumX += w * range.position.x;
    sumY += w * range.position.y;
    sumW += w;
  }
  return { x: sumX / sumW, y: sumY / sumW };
}

/**
 * 비콘 2개: 직선 위 최소점
 *
 * 직선 좌표 s (a에서 b 방향 거리, |ab| = L)에 대해
 *   f(s) = w1 (|s| - d1)^2 + w2 (|L - s| - d2)^2
 * 를 세 구간(s<0, 0≤s≤L, s>L)별 이차식 최소점 중 최소값으로 구한다.
 *
 * 두 비콘이 겹치면 null
 */
export function bilaterate(a: RangeMeasurement, b: RangeMeasurement): Position2D | null {
  const dx = b.position.x - a.position.x;
  const dy = b.position.y - a.position.y;
  const L = Math.hypot(dx, dy);
  if (L < 1e-9) {
    return null;
  }

  const w1 = a.weight;
  const w2 = b.weight;
  const d1 = a.distance;
  const d2 = b.distance;
  const wSum = w1 + w2;

  const cost = (s: number): number =>
    w1 * (Math.abs(s) - d1) ** 2 + w2 * (Math.abs(L - s) - d2) ** 2;

  const candidates = [
    clamp((w1 * d1 + w2 * (L - d2)) / wSum, 0, L),
    Math.max((w1 * d1 + w2 * (L + d2)) / wSum, L),
    Math.min((-w1 * d1 + w2 * (L - d2)) / wSum, 0),
  ];

  let best = candidates[0];
  let bestCost = cost(best);
  for (const s of candidates.slice(1)) {
    const c = cost(s);
    if (c < bestCost) {
      best = s;
      bestCost = c;
    }
  }

  return {
    x: a.position.x + (best * dx) / L,
    y: a.position.y + (best * dy) / L,
  };
}

/**
 * 비콘 3개 이상: 선형화 가중 최소제곱
 *
 * 기준 비콘 r (가중치 최대)에 대해 i ≠ r:
 *   2(xi - xr) x + 2(yi - yr) y = dr^2 - di^2 + xi^2 - xr^2 + yi^2 - yr^2
 *
 * 정규 행렬 N = A^T W A 가 퇴화(det ≤ tol * trace^2)하면 null
 */
export function multilaterate(
  ranges: readonly RangeMeasurement[],
  degeneracyTolerance: number
): Position2D | null {
  let refIndex = 0;
  ranges.forEach((range, i) => {
    if (range.weight > ranges[refIndex].weight) refIndex = i;
  });
  const ref = ranges[refIndex];
  const xr = ref.position.x;
  const yr = ref.position.y;
  const dr = ref.distance;

  let n00 = 0;
  let n01 = 0;
  let n11 = 0;
  let g0 = 0;
  let g1 = 0;

  ranges.forEach((range, i) => {
    if (i === refIndex) return;
    const { x: xi, y: yi } = range.position;
    const a0 = 2 * (xi - xr);
    const a1 = 2 * (yi - yr);
    const b = dr * dr - range.distance * range.distance + xi * xi - xr * xr + yi * yi - yr * yr;
    const w = range.weight;

    n00 += w * a0 * a0;
    n01 += w * a0 * a1;
    n11 += w * a1 * a1;
    g0 += w * a0 * b;
    g1 += w * a1 * b;
  });

  const det = n00 * n11 - n01 * n01;
  const trace = n00 + n11;
  if (trace <= 0 || det <= degeneracyTolerance * trace * trace) {
    return null;
  }

  return {
    x: (n11 * g0 - n01 * g1) / det,
    y: (n00 * g1 - n01 * g0) / det,
  };
}

// ============================================
// 메인 해석 함수
// ============================================

/**
 * 거리 측정 목록으로 원시 위치 해석
 */
export function resolvePosition(
  measurements: readonly RangeMeasurement[],
  config: ResolverConfig = DEFAULT_RESOLVER_CONFIG
): ResolveResult {
  const ranges = measurements.filter(isUsable);

  if (ranges.length < 2) {
    return { ok: false, reason: 'INSUFFICIENT_DATA', beaconCount: ranges.length };
  }

  const solved = ranges.length === 2
    ? bilaterate(ranges[0], ranges[1])
    : multilaterate(ranges, config.degeneracyTolerance);

  if (!solved) {
    const centroid = weightedCentroid(ranges, config.epsilon);
    return { ok: true, fix: buildFix(centroid, ranges, 'CENTROID', config.centroidPenalty, config) };
  }

  const method: FixMethod = ranges.length === 2 ? 'BILATERATION' : 'MULTILATERATION';
  const penalty = ranges.length === 2 ? config.bilaterationPenalty : 1;
  return { ok: true, fix: buildFix(solved, ranges, method, penalty, config) };
}
