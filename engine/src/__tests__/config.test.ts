/**
 * 설정 모듈 테스트
 */

import { loadConfig, getConfig } from '../config';
import { InvalidConfigurationError } from '../core/errors';

const ENV_KEYS = [
  'ENGINE_PORT',
  'WS_ENABLED',
  'LOGS_DIR',
  'LOG_CONSOLE_OUTPUT',
  'LOG_ENABLED',
  'BEACON_CONFIG_PATH',
  'NODE_ENV',
  'SIGNAL_PROPAGATION_FACTOR',
  'KALMAN_PROCESS_VARIANCE',
  'KALMAN_MEASUREMENT_VARIANCE',
  'KALMAN_MOTION_MODEL',
  'HISTORY_CAPACITY',
  'STALE_TIMEOUT_MS',
  'HARD_RESET_MS',
  'MAX_DISTANCE_M',
  'QUEUE_CAPACITY',
  'QUEUE_OVERFLOW',
];

describe('Config Module', () => {
  beforeEach(() => {
    // 환경 변수 초기화
    ENV_KEYS.forEach((key) => delete process.env[key]);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('loadConfig', () => {
    it('환경 변수가 없을 때 기본값을 반환해야 함', () => {
      const config = loadConfig();

      expect(config.port).toBe(8090);
      expect(config.wsEnabled).toBe(true);
      expect(config.logsDir).toBe('./logs');
      expect(config.logConsoleOutput).toBe(false);
      expect(config.logEnabled).toBe(true);
      expect(config.beaconConfigPath).toBe('./config/beacons.json');
      expect(config.nodeEnv).toBe('development');
      expect(config.propagationFactorOverride).toBeNull();
      expect(config.estimation.signalPropagationFactor).toBe(2.5);
      expect(config.estimation.kalman.measurementVariance).toBe(10.0);
      expect(config.estimation.queue.overflowPolicy).toBe('DROP_OLDEST');
    });

    it('환경 변수에서 설정을 로드해야 함', () => {
      process.env.ENGINE_PORT = '9100';
      process.env.WS_ENABLED = 'false';
      process.env.LOGS_DIR = './custom-logs';
      process.env.LOG_CONSOLE_OUTPUT = 'true';
      process.env.LOG_ENABLED = 'false';
      process.env.BEACON_CONFIG_PATH = './site/beacons.json';
      process.env.NODE_ENV = 'production';
      process.env.SIGNAL_PROPAGATION_FACTOR = '3.2';
      process.env.KALMAN_MOTION_MODEL = 'CONSTANT_VELOCITY';
      process.env.HISTORY_CAPACITY = '20';
      process.env.QUEUE_OVERFLOW = 'DROP_NEWEST';

      const config = loadConfig();

      expect(config.port).toBe(9100);
      expect(config.wsEnabled).toBe(false);
      expect(config.logsDir).toBe('./custom-logs');
      expect(config.logConsoleOutput).toBe(true);
      expect(config.logEnabled).toBe(false);
      expect(config.beaconConfigPath).toBe('./site/beacons.json');
      expect(config.nodeEnv).toBe('production');
      expect(config.propagationFactorOverride).toBe(3.2);
      expect(config.estimation.signalPropagationFactor).toBe(3.2);
      expect(config.estimation.kalman.motionModel).toBe('CONSTANT_VELOCITY');
      expect(config.estimation.tracker.historyCapacity).toBe(20);
      expect(config.estimation.queue.overflowPolicy).toBe('DROP_NEWEST');
    });

    it('포트 번호를 올바르게 파싱해야 함', () => {
      process.env.ENGINE_PORT = '3000';
      const config = loadConfig();
      expect(config.port).toBe(3000);
      expect(typeof config.port).toBe('number');
    });

    it('숫자가 아닌 포트는 거부해야 함', () => {
      process.env.ENGINE_PORT = 'abc';
      expect(() => loadConfig()).toThrow(InvalidConfigurationError);
    });

    it('범위를 벗어난 추정 파라미터는 기본값으로 대체하지 않고 거부해야 함', () => {
      process.env.KALMAN_MEASUREMENT_VARIANCE = '0';
      expect(() => loadConfig()).toThrow(InvalidConfigurationError);
    });

    it('범위를 벗어난 전파 계수는 거부해야 함', () => {
      process.env.SIGNAL_PROPAGATION_FACTOR = '9';
      expect(() => loadConfig()).toThrow(InvalidConfigurationError);
    });

    it('hardResetMs가 STALE 타임아웃보다 짧으면 거부해야 함', () => {
      process.env.HARD_RESET_MS = '1000';
      expect(() => loadConfig()).toThrow(InvalidConfigurationError);
    });
  });

  describe('getConfig', () => {
    it('싱글톤 인스턴스를 반환해야 함', () => {
      const config1 = getConfig();
      const config2 = getConfig();

      expect(config1).toBe(config2);
    });

    it('환경 변수 변경 후에도 같은 인스턴스를 반환해야 함', () => {
      const config1 = getConfig();
      process.env.ENGINE_PORT = '9999';
      const config2 = getConfig();

      // 싱글톤이므로 같은 인스턴스
      expect(config1).toBe(config2);
      // 하지만 값은 처음 로드된 값 유지
      expect(config2.port).toBe(8090);
    });
  });
});
