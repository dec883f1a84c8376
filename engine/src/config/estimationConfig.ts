/**
 * 위치 추정 파라미터 설정
 *
 * 로드 시점에 한 번 검증하고 동결(freeze)한다.
 * 범위를 벗어난 값은 기본값으로 대체하지 않고 즉시 거부한다.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../core/errors';

/** 경로 손실 지수 허용 범위 */
export const PROPAGATION_FACTOR_MIN = 1.0;
export const PROPAGATION_FACTOR_MAX = 6.0;

export const propagationFactorSchema = z
  .number()
  .min(PROPAGATION_FACTOR_MIN, {
    message: `signalPropagationFactor는 ${PROPAGATION_FACTOR_MIN} 이상이어야 합니다`,
  })
  .max(PROPAGATION_FACTOR_MAX, {
    message: `signalPropagationFactor는 ${PROPAGATION_FACTOR_MAX} 이하여야 합니다`,
  });

const distanceSchema = z
  .object({
    /** 최대 추정 거리 (m), 약한 신호 이상치 억제 */
    maxDistance: z.number().positive().default(30),
    /** 근거리 가중치 하한용 최소 거리 (m) */
    epsilon: z.number().positive().default(0.1),
  })
  .default({});

const resolverSchema = z
  .object({
    /** 신뢰도 계산용 잔차 스케일 (m) */
    residualScale: z.number().positive().default(1.0),
    /** 정규 행렬 퇴화 판정 허용치 */
    degeneracyTolerance: z.number().positive().default(1e-6),
    /** 비콘 2개 해석 시 신뢰도 배율 */
    bilaterationPenalty: z.number().gt(0).lte(1).default(0.5),
    /** 중심 대체 시 신뢰도 배율 */
    centroidPenalty: z.number().gt(0).lte(1).default(0.25),
  })
  .default({});

const kalmanSchema = z
  .object({
    /** 프로세스 분산 Q (초당) */
    processVariance: z.number().min(0, { message: 'processVariance는 0 이상이어야 합니다' }).default(1.0),
    /** 관측 분산 R (신뢰도로 스케일링되는 기준값) */
    measurementVariance: z.number().positive({ message: 'measurementVariance는 양수여야 합니다' }).default(10.0),
    motionModel: z.enum(['CONSTANT_POSITION', 'CONSTANT_VELOCITY']).default('CONSTANT_POSITION'),
    /** 초기 속도 분산 (등속 모델) */
    initialVelocityVariance: z.number().positive().default(1.0),
    /** R 스케일링 시 신뢰도 하한 */
    minConfidence: z.number().gt(0).lte(1).default(0.05),
  })
  .default({});

const trackerSchema = z
  .object({
    historyCapacity: z.number().int().positive().default(100),
    /** 이 시간 동안 갱신 없으면 STALE (ms) */
    staleTimeoutMs: z.number().int().positive().default(30000),
    /** 측정 간격이 이보다 크면 필터 재초기화 (ms) */
    hardResetMs: z.number().int().positive().default(300000),
  })
  .default({});

const queueSchema = z
  .object({
    /** 트래커별 대기열 용량 */
    capacity: z.number().int().positive().default(32),
    overflowPolicy: z.enum(['DROP_OLDEST', 'DROP_NEWEST']).default('DROP_OLDEST'),
  })
  .default({});

export const estimationConfigSchema = z
  .object({
    signalPropagationFactor: propagationFactorSchema.default(2.5),
    distance: distanceSchema,
    resolver: resolverSchema,
    kalman: kalmanSchema,
    tracker: trackerSchema,
    queue: queueSchema,
  })
  .superRefine((config, ctx) => {
    if (config.tracker.hardResetMs < config.tracker.staleTimeoutMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tracker', 'hardResetMs'],
        message: 'hardResetMs는 staleTimeoutMs 이상이어야 합니다',
      });
    }
  });

export type EstimationConfig = z.infer<typeof estimationConfigSchema>;
export type EstimationConfigInput = z.input<typeof estimationConfigSchema>;
export type QueueOverflowPolicy = EstimationConfig['queue']['overflowPolicy'];

/**
 * zod 이슈를 "경로: 메시지" 형식으로 변환
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * 추정 설정 생성 (검증 + 동결)
 *
 * @throws InvalidConfigurationError 범위를 벗어난 값이 있을 때
 */
export function createEstimationConfig(input: EstimationConfigInput = {}): EstimationConfig {
  const result = estimationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(formatZodIssues(result.error));
  }
  return deepFreeze(result.data);
}

/**
 * 경로 손실 지수 단독 검증 (레지스트리 재로드용)
 */
export function validatePropagationFactor(value: number): number {
  const result = propagationFactorSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidConfigurationError(formatZodIssues(result.error));
  }
  return result.data;
}

export const DEFAULT_ESTIMATION_CONFIG: EstimationConfig = createEstimationConfig();
