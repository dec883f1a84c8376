/**
 * 위치 추정 에러 분류
 *
 * 관측/보고 단위 에러는 로컬에서 복구하고 카운터로만 노출한다.
 * 설정 에러만 시작 시점에 치명적으로 처리한다.
 */

/**
 * 에러 코드 정의
 */
export enum EstimationErrorCode {
  // 관측 단위
  UNKNOWN_BEACON = 'UNKNOWN_BEACON',
  INVALID_RSSI = 'INVALID_RSSI',
  INVALID_OBSERVATION = 'INVALID_OBSERVATION',

  // 보고 단위
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  OUT_OF_ORDER_REPORT = 'OUT_OF_ORDER_REPORT',
  DEGENERATE_GEOMETRY = 'DEGENERATE_GEOMETRY',
  INVALID_REPORT = 'INVALID_REPORT',
  QUEUE_OVERFLOW = 'QUEUE_OVERFLOW',
  PROCESSING_FAILURE = 'PROCESSING_FAILURE',

  // 설정
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
}

/**
 * 에러 메시지 정의
 */
export const ESTIMATION_ERROR_MESSAGES: Record<EstimationErrorCode, string> = {
  [EstimationErrorCode.UNKNOWN_BEACON]: '등록되지 않은 비콘입니다',
  [EstimationErrorCode.INVALID_RSSI]: 'RSSI 값이 올바르지 않습니다',
  [EstimationErrorCode.INVALID_OBSERVATION]: '비콘 식별자 또는 RSSI가 없는 관측입니다',
  [EstimationErrorCode.INSUFFICIENT_DATA]: '위치 계산에 필요한 비콘 수가 부족합니다',
  [EstimationErrorCode.OUT_OF_ORDER_REPORT]: '순서가 뒤바뀐 보고입니다',
  [EstimationErrorCode.DEGENERATE_GEOMETRY]: '비콘 배치가 일직선이거나 겹쳐 있습니다',
  [EstimationErrorCode.INVALID_REPORT]: '잘못된 보고 형식입니다',
  [EstimationErrorCode.QUEUE_OVERFLOW]: '트래커 대기열이 가득 찼습니다',
  [EstimationErrorCode.PROCESSING_FAILURE]: '보고 처리 중 내부 오류',
  [EstimationErrorCode.INVALID_CONFIGURATION]: '설정 값이 올바르지 않습니다',
};

/**
 * 설정 검증 실패 (시작 시점 치명적 에러)
 */
export class InvalidConfigurationError extends Error {
  readonly code = EstimationErrorCode.INVALID_CONFIGURATION;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`${ESTIMATION_ERROR_MESSAGES[EstimationErrorCode.INVALID_CONFIGURATION]}: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export interface RecordedError {
  code: EstimationErrorCode;
  timestamp: number;
  trackerId: string | null;
  details?: Record<string, unknown>;
}

/**
 * 에러 카운터
 *
 * 누적 카운트와 최근 에러 목록(최대 recentLimit개)을 유지한다.
 */
export class EstimationErrorLog {
  private counts: Map<EstimationErrorCode, number> = new Map();
  private windowCounts: Map<EstimationErrorCode, number> = new Map();
  private recent: RecordedError[] = [];
  private readonly recentLimit: number;

  constructor(recentLimit: number = 100) {
    this.recentLimit = recentLimit;
  }

  /**
   * 에러 기록
   */
  record(
    code: EstimationErrorCode,
    trackerId: string | null,
    details?: Record<string, unknown>,
    timestamp: number = Date.now()
  ): void {
    this.counts.set(code, (this.counts.get(code) ?? 0) + 1);
    this.windowCounts.set(code, (this.windowCounts.get(code) ?? 0) + 1);

    this.recent.push({ code, timestamp, trackerId, details });
    if (this.recent.length > this.recentLimit) {
      this.recent.shift();
    }
  }

  /**
   * 코드별 누적 카운트
   */
  count(code: EstimationErrorCode): number {
    return this.counts.get(code) ?? 0;
  }

  /**
   * 전체 카운트 (0이 아닌 코드만)
   */
  getCounts(): Partial<Record<EstimationErrorCode, number>> {
    const result: Partial<Record<EstimationErrorCode, number>> = {};
    for (const [code, count] of this.counts.entries()) {
      result[code] = count;
    }
    return result;
  }

  /**
   * 최근 에러 조회
   */
  getRecentErrors(limit: number = 10): RecordedError[] {
    return this.recent.slice(-limit);
  }

  /**
   * 주기적으로 에러 통계 출력
   *
   * 반환된 함수를 호출하면 중지된다.
   */
  startPeriodicReport(intervalMs: number = 60000): () => void {
    const interval = setInterval(() => this.printStats(intervalMs), intervalMs);
    interval.unref();
    return () => clearInterval(interval);
  }

  private printStats(intervalMs: number): void {
    if (this.windowCounts.size === 0) return;

    console.log('========================================');
    console.log(`  추정 에러 통계 (지난 ${Math.round(intervalMs / 1000)}초)`);
    console.log('========================================');

    for (const [code, count] of this.windowCounts.entries()) {
      console.log(`  ${ESTIMATION_ERROR_MESSAGES[code]}: ${count}회`);
    }

    console.log('========================================');

    this.windowCounts.clear();
  }
}
