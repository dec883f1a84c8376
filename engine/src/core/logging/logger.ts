/**
 * JSONL 로거 시스템
 *
 * 추정 이벤트를 JSONL 형식으로 파일에 저장합니다.
 * 파일명: {logsDir}/estimation_{timestamp}.jsonl
 */

import * as fs from 'fs';
import * as path from 'path';
import { EventLoggerStats, LogEvent } from './eventSchemas';

export interface LoggerConfig {
  logsDir: string;
  enabled: boolean;
  consoleOutput: boolean;  // 콘솔에도 출력할지 여부
  customFilename?: string;  // 커스텀 파일명 (선택사항)
}

const DEFAULT_CONFIG: LoggerConfig = {
  logsDir: './logs',
  enabled: true,
  consoleOutput: false,
  customFilename: undefined,
};

function emptyStats(): EventLoggerStats {
  return {
    trackers_created: 0,
    positions_updated: 0,
    no_fix: 0,
    observations_dropped: 0,
    reports_rejected: 0,
    filter_resets: 0,
  };
}

export class EstimationEventLogger {
  private config: LoggerConfig;
  private currentFile: string | null = null;
  private writeStream: fs.WriteStream | null = null;
  private eventCount: number = 0;
  private stats: EventLoggerStats = emptyStats();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * 로그 디렉토리 확인/생성
   */
  private ensureLogsDir(): void {
    if (!fs.existsSync(this.config.logsDir)) {
      fs.mkdirSync(this.config.logsDir, { recursive: true });
    }
  }

  /**
   * 로그 파일 열기
   */
  open(): void {
    if (this.writeStream || !this.config.enabled) return;

    this.ensureLogsDir();
    const filename = this.config.customFilename
      ?? `estimation_${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
    this.currentFile = path.join(this.config.logsDir, filename);
    this.writeStream = fs.createWriteStream(this.currentFile, { flags: 'a' });
    this.eventCount = 0;
    console.log(`[Logger] 로그 파일 생성: ${this.currentFile}`);
  }

  /**
   * 로그 파일 닫기 (요약 이벤트 기록)
   */
  close(): void {
    if (!this.writeStream) return;

    this.log({ timestamp: Date.now(), event: 'session_end', summary: this.getStats() });

    this.writeStream.end();
    this.writeStream = null;
    console.log(`[Logger] 로그 저장 완료: ${this.eventCount}개 이벤트, ${this.currentFile}`);
    this.currentFile = null;
  }

  /**
   * 이벤트 로깅
   */
  log(event: LogEvent): void {
    this.updateStats(event);

    if (!this.config.enabled) return;

    const line = JSON.stringify(event);

    if (this.writeStream) {
      this.writeStream.write(line + '\n');
      this.eventCount++;
    }

    if (this.config.consoleOutput) {
      console.log(`[Log] ${event.event}:`, line.substring(0, 120));
    }
  }

  /**
   * 통계 업데이트
   */
  private updateStats(event: LogEvent): void {
    switch (event.event) {
      case 'tracker_created':
        this.stats.trackers_created++;
        break;
      case 'position_updated':
        this.stats.positions_updated++;
        if (event.filter_reset) {
          this.stats.filter_resets++;
        }
        break;
      case 'no_fix':
        this.stats.no_fix++;
        break;
      case 'observation_dropped':
        this.stats.observations_dropped++;
        break;
      case 'report_rejected':
        this.stats.reports_rejected++;
        break;
    }
  }

  /**
   * 현재 통계 반환
   */
  getStats(): EventLoggerStats {
    return { ...this.stats };
  }

  getCurrentLogFile(): string | null {
    return this.currentFile;
  }
}
