/**
 * 칼만 필터 구현 모듈
 *
 * 트래커별 2D 위치 평활화용 선형 칼만 필터
 *
 * 상태 벡터:
 *   - CONSTANT_POSITION: x = [px, py]^T
 *   - CONSTANT_VELOCITY: x = [px, py, vx, vy]^T
 *
 * 관측 모델 (선형): z = [px, py]^T = H * x + v
 *
 * 관측 노이즈 R은 기준 분산을 위치 해석 신뢰도로 나눈 값 (신뢰도 낮을수록 노이즈 증가)
 *
 * 같은 위치가 반복 관측될 때 추정값이 관측을 넘어서지 않는 것은 정지 모델에서만 성립한다.
 * 등속 모델은 초기 접근 중 쌓인 속도 때문에 관측 위치를 잠시 지나쳤다가 되돌아온다.
 */

import { MotionModel } from '../../../../shared/schemas';
import { Position2D } from '../estimation/types';
import {
  Matrix,
  columnMatrixToVector,
  diagonalMatrix,
  identityMatrix,
  matrixAdd,
  matrixInverse,
  matrixMultiply,
  matrixScalarMultiply,
  matrixSubtract,
  matrixTranspose,
  vectorToColumnMatrix,
} from '../estimation/matrix';

// ============================================
// 칼만 필터 타입 정의
// ============================================

/**
 * 칼만 필터 상태
 */
export interface KalmanState {
  /** 상태 벡터 */
  x: number[];
  /** 공분산 행렬 */
  P: Matrix;
  /** 마지막 갱신 시각 (측정 시각, Unix ms) */
  lastUpdateTime: number;
  model: MotionModel;
}

/**
 * 칼만 필터 설정
 */
export interface KalmanConfig {
  /** 프로세스 분산 Q (초당) */
  processVariance: number;
  /** 관측 분산 R 기준값 */
  measurementVariance: number;
  motionModel: MotionModel;
  /** 초기 속도 분산 (등속 모델) */
  initialVelocityVariance: number;
  /** R 스케일링 시 신뢰도 하한 */
  minConfidence: number;
}

export const DEFAULT_KALMAN_CONFIG: KalmanConfig = {
  processVariance: 1.0,
  measurementVariance: 10.0,
  motionModel: 'CONSTANT_POSITION',
  initialVelocityVariance: 1.0,
  minConfidence: 0.05,
};

// ============================================
// 칼만 필터 클래스
// ============================================

export class PositionKalmanFilter {
  private config: KalmanConfig;

  constructor(config: Partial<KalmanConfig> = {}) {
    this.config = { ...DEFAULT_KALMAN_CONFIG, ...config };
  }

  get motionModel(): MotionModel {
    return this.config.motionModel;
  }

  private get dimension(): number {
    return this.config.motionModel === 'CONSTANT_VELOCITY' ? 4 : 2;
  }

  /**
   * 신뢰도로 스케일링한 관측 분산
   */
  measurementNoise(confidence: number): number {
    return this.config.measurementVariance / Math.max(confidence, this.config.minConfidence);
  }

  // ============================================
  // 초기화
  // ============================================

  /**
   * 원시 위치 해석 결과로 초기 상태 생성
   */
  createInitialState(position: Position2D, time: number, confidence: number = 1): KalmanState {
    const r = this.measurementNoise(confidence);

    if (this.config.motionModel === 'CONSTANT_VELOCITY') {
      const v = this.config.initialVelocityVariance;
      return {
        x: [position.x, position.y, 0, 0],
        P: diagonalMatrix([r, r, v, v]),
        lastUpdateTime: time,
        model: 'CONSTANT_VELOCITY',
      };
    }

    return {
      x: [position.x, position.y],
      P: diagonalMatrix([r, r]),
      lastUpdateTime: time,
      model: 'CONSTANT_POSITION',
    };
  }

  // ============================================
  // 예측 단계 (Predict)
  // ============================================

  /**
   * 상태 예측 (time까지 경과)
   *
   * x_pred = F * x, P_pred = F * P * F^T + Q
   */
  predict(state: KalmanState, time: number): KalmanState {
    const dt = (time - state.lastUpdateTime) / 1000;
    if (dt <= 0) return state;

    const F = this.getStateTransitionMatrix(dt);
    const Q = this.getProcessNoiseMatrix(dt);

    const x_pred = columnMatrixToVector(matrixMultiply(F, vectorToColumnMatrix(state.x)));
    const FPFt = matrixMultiply(matrixMultiply(F, state.P), matrixTranspose(F));

    return {
      x: x_pred,
      P: matrixAdd(FPFt, Q),
      lastUpdateTime: time,
      model: state.model,
    };
  }

  /**
   * 상태 전이 행렬 F
   */
  private getStateTransitionMatrix(dt: number): Matrix {
    if (this.config.motionModel === 'CONSTANT_VELOCITY') {
      return [
        [1, 0, dt, 0],
        [0, 1, 0, dt],
        [0, 0, 1, 0],
        [0, 0, 0, 1],
      ];
    }
    return identityMatrix(2);
  }

  /**
   * 프로세스 노이즈 Q
   *
   * - 정지 모델: 랜덤 워크, q * dt * I
   * - 등속 모델: 이산 백색 가속도 노이즈
   */
  private getProcessNoiseMatrix(dt: number): Matrix {
    const q = this.config.processVariance;

    if (this.config.motionModel === 'CONSTANT_VELOCITY') {
      const dt2 = dt * dt;
      const dt3 = dt2 * dt;
      const dt4 = dt3 * dt;
      return matrixScalarMultiply(q, [
        [dt4 / 4, 0, dt3 / 2, 0],
        [0, dt4 / 4, 0, dt3 / 2],
        [dt3 / 2, 0, dt2, 0],
        [0, dt3 / 2, 0, dt2],
      ]);
    }

    return diagonalMatrix([q * dt, q * dt]);
  }

  // ============================================
  // 업데이트 단계 (Update)
  // ============================================

  /**
   * 원시 위치로 상태 업데이트
   */
  update(state: KalmanState, measurement: Position2D, confidence: number, time: number): KalmanState {
    const n = state.x.length;
    const H = this.getObservationMatrix(n);
    const r = this.measurementNoise(confidence);
    const R = diagonalMatrix([r, r]);

    // 혁신: y = z - H * x
    const y = [measurement.x - state.x[0], measurement.y - state.x[1]];

    // 혁신 공분산: S = H * P * H^T + R
    const Ht = matrixTranspose(H);
    const S = matrixAdd(matrixMultiply(matrixMultiply(H, state.P), Ht), R);

    const S_inv = matrixInverse(S);
    if (!S_inv) {
      return { ...state, lastUpdateTime: Math.max(state.lastUpdateTime, time) };
    }

    // 칼만 이득: K = P * H^T * S^-1
    const K = matrixMultiply(matrixMultiply(state.P, Ht), S_inv);

    // 상태 업데이트: x = x + K * y
    const Ky = matrixMultiply(K, vectorToColumnMatrix(y));
    const x_new = state.x.map((xi, i) => xi + Ky[i][0]);

    // 공분산 업데이트: P = (I - K*H) * P (대칭화)
    const P_raw = matrixMultiply(matrixSubtract(identityMatrix(n), matrixMultiply(K, H)), state.P);
    const P_new = matrixScalarMultiply(0.5, matrixAdd(P_raw, matrixTranspose(P_raw)));

    return {
      x: x_new,
      P: P_new,
      lastUpdateTime: Math.max(state.lastUpdateTime, time),
      model: state.model,
    };
  }

  private getObservationMatrix(n: number): Matrix {
    const H: Matrix = [new Array<number>(n).fill(0), new Array<number>(n).fill(0)];
    H[0][0] = 1;
    H[1][1] = 1;
    return H;
  }

  /**
   * 예측 + 업데이트 1 사이클
   */
  step(state: KalmanState, measurement: Position2D, confidence: number, time: number): KalmanState {
    return this.update(this.predict(state, time), measurement, confidence, time);
  }

  // ============================================
  // 상태 추출
  // ============================================

  getPosition(state: KalmanState): Position2D {
    return { x: state.x[0], y: state.x[1] };
  }

  /**
   * 속도 (정지 모델이면 0)
   */
  getVelocity(state: KalmanState): { vx: number; vy: number } {
    if (state.x.length < 4) return { vx: 0, vy: 0 };
    return { vx: state.x[2], vy: state.x[3] };
  }

  /**
   * 위치 불확실성 (표준편차)
   */
  getPositionUncertainty(state: KalmanState): { x: number; y: number } {
    return {
      x: Math.sqrt(state.P[0][0]),
      y: Math.sqrt(state.P[1][1]),
    };
  }
}

export default PositionKalmanFilter;
