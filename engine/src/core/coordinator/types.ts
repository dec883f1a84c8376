/**
 * 추정 조정기 타입 정의
 */

import { FixMethod, TrackerStateSnapshot, TrackerUpdateEvent } from '../../../../shared/schemas';

/** 보고 처리 결과 상태 */
export type ReportStatus =
  | 'APPLIED'                // 위치 갱신됨
  | 'NO_FIX'                 // 비콘 부족, 마지막 위치 유지
  | 'REJECTED_OUT_OF_ORDER'  // 순서 위반 거부
  | 'DROPPED'                // 대기열 초과로 폐기
  | 'REJECTED_SHUTDOWN'      // 종료 중
  | 'FAILED';                // 내부 오류

export interface ReportOutcome {
  status: ReportStatus;
  trackerId: string;
  /** 처리 직후 게시 상태 (거부/폐기 시 null) */
  tracker: TrackerStateSnapshot | null;
  method?: FixMethod;
  filterReset?: boolean;
  detail?: string;
}

/** 트래커 갱신 게시 콜백 */
export type TrackerUpdateListener = (event: TrackerUpdateEvent) => void;
