/**
 * 환경 변수 검증 및 로드
 * Zod 스키마 기반 타입 안전 환경 설정
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { InvalidConfigurationError } from '../core/errors';

// .env 파일 로드
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
  console.log('[Config] .env 파일 로드됨:', envPath);
} else {
  console.warn('[Config] .env 파일 없음. 기본값 또는 시스템 환경 변수 사용');
}

/**
 * 숫자형 환경 변수
 */
function numberVar(defaultValue: string, name: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => Number(val))
    .refine((val) => Number.isFinite(val), {
      message: `${name}는 숫자여야 합니다`,
    });
}

function integerVar(defaultValue: string, name: string) {
  return numberVar(defaultValue, name).refine((val) => Number.isInteger(val) && val > 0, {
    message: `${name}는 양의 정수여야 합니다`,
  });
}

function booleanVar(defaultValue: 'true' | 'false') {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => val.toLowerCase() === 'true');
}

/**
 * 환경 변수 스키마 정의
 */
const envSchema = z.object({
  // 서버 설정
  ENGINE_PORT: integerVar('8090', 'ENGINE_PORT').refine((val) => val < 65536, {
    message: 'ENGINE_PORT는 1-65535 사이여야 합니다',
  }),

  WS_ENABLED: booleanVar('true'),

  // 로깅 설정
  LOGS_DIR: z.string().default('./logs'),
  LOG_CONSOLE_OUTPUT: booleanVar('false'),
  LOG_ENABLED: z
    .string()
    .default('true')
    .transform((val) => val.toLowerCase() !== 'false'),

  // 비콘 배치 파일
  BEACON_CONFIG_PATH: z.string().default('./config/beacons.json'),

  // 환경 설정
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  // 신호 전파 (지정 시 배치 파일 값보다 우선)
  SIGNAL_PROPAGATION_FACTOR: z
    .string()
    .optional()
    .transform((val) => (val === undefined || val === '' ? null : Number(val)))
    .refine((val) => val === null || Number.isFinite(val), {
      message: 'SIGNAL_PROPAGATION_FACTOR는 숫자여야 합니다',
    }),

  // 칼만 필터
  KALMAN_PROCESS_VARIANCE: numberVar('1.0', 'KALMAN_PROCESS_VARIANCE'),
  KALMAN_MEASUREMENT_VARIANCE: numberVar('10.0', 'KALMAN_MEASUREMENT_VARIANCE'),
  KALMAN_MOTION_MODEL: z
    .enum(['CONSTANT_POSITION', 'CONSTANT_VELOCITY'])
    .default('CONSTANT_POSITION'),

  // 트래커 상태
  HISTORY_CAPACITY: integerVar('100', 'HISTORY_CAPACITY'),
  STALE_TIMEOUT_MS: integerVar('30000', 'STALE_TIMEOUT_MS'),
  HARD_RESET_MS: integerVar('300000', 'HARD_RESET_MS'),

  // 거리 추정
  MAX_DISTANCE_M: numberVar('30', 'MAX_DISTANCE_M'),

  // 트래커별 대기열
  QUEUE_CAPACITY: integerVar('32', 'QUEUE_CAPACITY'),
  QUEUE_OVERFLOW: z.enum(['DROP_OLDEST', 'DROP_NEWEST']).default('DROP_OLDEST'),
});

/**
 * 환경 변수 타입
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 환경 변수 검증 및 로드
 *
 * @throws InvalidConfigurationError
 */
export function loadAndValidateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.issues.map(
      (err: z.ZodIssue) => `${err.path.join('.')}: ${err.message}`
    );
    console.error('[Config] 환경 변수 검증 실패:');
    issues.forEach((issue) => console.error(`  - ${issue}`));
    throw new InvalidConfigurationError(issues);
  }

  console.log('[Config] 환경 변수 검증 성공');
  return result.data;
}

/**
 * 환경 변수 출력 (디버깅용)
 */
export function printEnvConfig(env: Env): void {
  console.log('========================================');
  console.log('  환경 설정 (Beacon Position Engine)');
  console.log('========================================');
  console.log(`환경: ${env.NODE_ENV}`);
  console.log(`포트: ${env.ENGINE_PORT} (WebSocket ${env.WS_ENABLED ? '활성' : '비활성'})`);
  console.log(`로그 디렉토리: ${env.LOGS_DIR}`);
  console.log(`로그 활성화: ${env.LOG_ENABLED}`);
  console.log(`콘솔 로그 출력: ${env.LOG_CONSOLE_OUTPUT}`);
  console.log(`비콘 배치 파일: ${env.BEACON_CONFIG_PATH}`);
  console.log('----------------------------------------');
  console.log(`전파 계수: ${env.SIGNAL_PROPAGATION_FACTOR ?? '(배치 파일 값 사용)'}`);
  console.log(`칼만 Q/R: ${env.KALMAN_PROCESS_VARIANCE} / ${env.KALMAN_MEASUREMENT_VARIANCE}`);
  console.log(`운동 모델: ${env.KALMAN_MOTION_MODEL}`);
  console.log(`이력 용량: ${env.HISTORY_CAPACITY}`);
  console.log(`STALE 타임아웃: ${env.STALE_TIMEOUT_MS}ms, 필터 재초기화: ${env.HARD_RESET_MS}ms`);
  console.log(`대기열: ${env.QUEUE_CAPACITY} (${env.QUEUE_OVERFLOW})`);
  console.log('========================================');
}
