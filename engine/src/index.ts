/**
 * 비콘 위치 추정 엔진
 * 진입점
 *
 * 표준 입력으로 NDJSON 트래커 보고를 받아 처리하고, WebSocket으로 상태를 게시한다.
 * SIGHUP 수신 시 비콘 배치 파일을 다시 읽는다.
 */

import { getConfig, EngineConfig } from './config';
import { loadBeaconLayout } from './config/beaconLayout';
import { BeaconRegistry } from './core/registry/beaconRegistry';
import { EstimationCoordinator } from './core/coordinator/estimationCoordinator';
import { EstimationErrorLog, InvalidConfigurationError } from './core/errors';
import { EstimationEventLogger } from './core/logging/logger';
import { ingestJsonLines } from './ingest/jsonlSource';
import { TrackerStateServer } from './websocket/server';

/**
 * 배치 파일 → 레지스트리
 */
function loadRegistry(coordinator: EstimationCoordinator, config: EngineConfig): void {
  const layout = loadBeaconLayout(config.beaconConfigPath);
  if (!layout) return;
  coordinator.reloadRegistry(
    layout.beacons,
    config.propagationFactorOverride ?? layout.signalPropagationFactor
  );
}

async function main(): Promise<void> {
  console.log('========================================');
  console.log('  비콘 위치 추정 엔진');
  console.log('  Beacon Position Engine');
  console.log('========================================');

  const config = getConfig();
  const registry = new BeaconRegistry();
  const errorLog = new EstimationErrorLog();
  const logger = new EstimationEventLogger({
    logsDir: config.logsDir,
    enabled: config.logEnabled,
    consoleOutput: config.logConsoleOutput,
  });

  let server: TrackerStateServer | null = null;
  const coordinator = new EstimationCoordinator(
    registry,
    config.estimation,
    (event) => server?.broadcast(event),
    { logger, errorLog }
  );

  // 설정 오류는 트래픽 수신 전에 치명적으로 처리
  loadRegistry(coordinator, config);

  logger.open();
  logger.log({
    timestamp: Date.now(),
    event: 'session_start',
    beacon_count: coordinator.beaconCount,
    propagation_factor: coordinator.currentPropagationFactor,
    motion_model: config.estimation.kalman.motionModel,
  });

  if (config.wsEnabled) {
    server = new TrackerStateServer(config.port, coordinator);
  }
  const stopErrorReport = errorLog.startPeriodicReport();

  process.on('SIGHUP', () => {
    try {
      loadRegistry(coordinator, config);
    } catch (error) {
      if (error instanceof InvalidConfigurationError) {
        console.error('[Engine] 배치 재로드 실패, 기존 레지스트리 유지:', error.issues);
        return;
      }
      throw error;
    }
  });

  const shutdown = async (): Promise<void> => {
    console.log('\n[Engine] 종료 중...');
    stopErrorReport();
    await coordinator.shutdown();
    if (server) {
      await server.close();
    }
    logger.close();
  };

  const exitAfterShutdown = (): void => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[Engine] 종료 중 오류:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', exitAfterShutdown);
  process.on('SIGTERM', exitAfterShutdown);

  console.log('[Engine] 준비 완료');

  if (!process.stdin.isTTY) {
    const stats = await ingestJsonLines(process.stdin, (report) => coordinator.submit(report), errorLog);
    console.log(
      `[Engine] 입력 종료: ${stats.accepted}/${stats.lines}건 수신, 위치 갱신 ${stats.outcomes.APPLIED}건, 잘못된 보고 ${stats.invalid}건`
    );
    if (!server) {
      await shutdown();
    }
  }
}

main().catch((error: unknown) => {
  if (error instanceof InvalidConfigurationError) {
    console.error('[Engine] 설정 오류로 시작할 수 없습니다:');
    error.issues.forEach((issue) => console.error(`  - ${issue}`));
  } else {
    console.error('[Engine] 시작 실패:', error);
  }
  process.exit(1);
});
