/**
 * JSONL 추정 이벤트 로거 테스트
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EstimationEventLogger } from '../core/logging/logger';
import { EstimationErrorCode } from '../core/errors';

describe('Estimation Event Logger', () => {
  it('비활성 상태에서도 통계는 집계해야 함', () => {
    const logger = new EstimationEventLogger({ enabled: false });

    logger.log({ timestamp: 1, event: 'tracker_created', tracker_id: 'T-1' });
    logger.log({
      timestamp: 2,
      event: 'position_updated',
      tracker_id: 'T-1',
      report_time: 2,
      raw: { x: 1, y: 1 },
      smoothed: { x: 1, y: 1 },
      uncertainty: null,
      velocity: null,
      confidence: 1,
      method: 'MULTILATERATION',
      beacon_count: 3,
      filter_reset: true,
    });
    logger.log({
      timestamp: 3,
      event: 'observation_dropped',
      tracker_id: 'T-1',
      beacon_key: 'mac:FF',
      reason: EstimationErrorCode.UNKNOWN_BEACON,
    });
    logger.log({ timestamp: 4, event: 'no_fix', tracker_id: 'T-1', report_time: 4, beacon_count: 1 });

    expect(logger.getStats()).toEqual({
      trackers_created: 1,
      positions_updated: 1,
      no_fix: 1,
      observations_dropped: 1,
      reports_rejected: 0,
      filter_resets: 1,
    });
  });

  it('비활성 로거는 파일을 만들지 않아야 함', () => {
    const logsDir = path.join(os.tmpdir(), `estimation-logs-disabled-${process.pid}`);
    const logger = new EstimationEventLogger({ enabled: false, logsDir });

    logger.open();

    expect(logger.getCurrentLogFile()).toBeNull();
    expect(fs.existsSync(logsDir)).toBe(false);
  });

  it('열면 로그 디렉토리와 파일 경로를 준비해야 함', async () => {
    const logsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'estimation-logs-'));
    const nested = path.join(logsDir, 'nested');
    const logger = new EstimationEventLogger({ logsDir: nested, customFilename: 'session.jsonl' });
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    try {
      logger.open();
      expect(fs.existsSync(nested)).toBe(true);
      expect(logger.getCurrentLogFile()).toBe(path.join(nested, 'session.jsonl'));

      logger.close();
      expect(logger.getCurrentLogFile()).toBeNull();
    } finally {
      spy.mockRestore();
      // 스트림 종료 후 정리
      await new Promise((resolve) => setTimeout(resolve, 20));
      fs.rmSync(logsDir, { recursive: true, force: true });
    }
  });
});
