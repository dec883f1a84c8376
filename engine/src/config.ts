/**
 * 엔진 설정 관리
 * 환경 변수 기반 설정 로더 (Zod 검증 포함)
 */

import { loadAndValidateEnv, printEnvConfig, type Env } from './config/env';
import { createEstimationConfig, type EstimationConfig } from './config/estimationConfig';

export interface EngineConfig {
  port: number;
  wsEnabled: boolean;
  logsDir: string;
  logConsoleOutput: boolean;
  logEnabled: boolean;
  beaconConfigPath: string;
  nodeEnv: string;
  /** 배치 파일 값보다 우선하는 전파 계수 (없으면 null) */
  propagationFactorOverride: number | null;
  estimation: EstimationConfig;
}

/**
 * 환경 변수에서 설정 로드 (검증 포함)
 *
 * @throws InvalidConfigurationError
 */
export function loadConfig(): EngineConfig {
  const env: Env = loadAndValidateEnv();

  // 개발 모드에서 설정 출력
  if (env.NODE_ENV === 'development') {
    printEnvConfig(env);
  }

  const estimation = createEstimationConfig({
    ...(env.SIGNAL_PROPAGATION_FACTOR !== null
      ? { signalPropagationFactor: env.SIGNAL_PROPAGATION_FACTOR }
      : {}),
    distance: { maxDistance: env.MAX_DISTANCE_M },
    kalman: {
      processVariance: env.KALMAN_PROCESS_VARIANCE,
      measurementVariance: env.KALMAN_MEASUREMENT_VARIANCE,
      motionModel: env.KALMAN_MOTION_MODEL,
    },
    tracker: {
      historyCapacity: env.HISTORY_CAPACITY,
      staleTimeoutMs: env.STALE_TIMEOUT_MS,
      hardResetMs: env.HARD_RESET_MS,
    },
    queue: {
      capacity: env.QUEUE_CAPACITY,
      overflowPolicy: env.QUEUE_OVERFLOW,
    },
  });

  return {
    port: env.ENGINE_PORT,
    wsEnabled: env.WS_ENABLED,
    logsDir: env.LOGS_DIR,
    logConsoleOutput: env.LOG_CONSOLE_OUTPUT,
    logEnabled: env.LOG_ENABLED,
    beaconConfigPath: env.BEACON_CONFIG_PATH,
    nodeEnv: env.NODE_ENV,
    propagationFactorOverride: env.SIGNAL_PROPAGATION_FACTOR,
    estimation,
  };
}

/**
 * 기본 설정 인스턴스 (싱글톤)
 */
let configInstance: EngineConfig | null = null;

/**
 * 설정 싱글톤 가져오기
 */
export function getConfig(): EngineConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
