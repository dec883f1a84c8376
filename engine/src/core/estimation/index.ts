/**
 * 거리 추정 / 위치 해석 모듈 - 진입점
 */

export * from './types';
export * from './distanceEstimator';
export * from './positionResolver';
