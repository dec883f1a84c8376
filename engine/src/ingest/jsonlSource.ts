/**
 * NDJSON 보고 수집기
 *
 * 읽기 스트림에서 한 줄에 보고 하나씩 읽어 조정기 대기열에 넣는다.
 * 각 보고의 처리 완료를 기다리지 않고 계속 읽으며, 스트림이 끝나면 남은 처리를 모두 기다린다.
 * 보고마다 이벤트 루프에 한 번 양보해 대기열이 읽기 속도에 맞춰 비워지도록 한다.
 */

import * as readline from 'readline';
import { Readable } from 'stream';
import { TrackerReport } from '../../../shared/schemas';
import { ReportOutcome, ReportStatus } from '../core/coordinator/types';
import { EstimationErrorCode, EstimationErrorLog } from '../core/errors';
import { normalizeTrackerReport } from './reportSchema';

export type ReportSink = (report: TrackerReport) => Promise<ReportOutcome>;

export interface IngestStats {
  lines: number;
  accepted: number;
  invalid: number;
  observationsRejected: number;
  outcomes: Record<ReportStatus, number>;
}

function emptyStats(): IngestStats {
  return {
    lines: 0,
    accepted: 0,
    invalid: 0,
    observationsRejected: 0,
    outcomes: {
      APPLIED: 0,
      NO_FIX: 0,
      REJECTED_OUT_OF_ORDER: 0,
      DROPPED: 0,
      REJECTED_SHUTDOWN: 0,
      FAILED: 0,
    },
  };
}

/**
 * 한 줄 파싱 (JSON 오류는 null)
 */
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(() => resolve()));
}

/**
 * 스트림의 모든 보고 수집
 */
export async function ingestJsonLines(
  input: Readable,
  sink: ReportSink,
  errorLog: EstimationErrorLog = new EstimationErrorLog()
): Promise<IngestStats> {
  const stats = emptyStats();
  const pending = new Set<Promise<void>>();
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  for await (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    stats.lines++;

    const raw = parseLine(trimmed);
    const result = raw === null
      ? { ok: false as const, issues: ['JSON 파싱 실패'] }
      : normalizeTrackerReport(raw);

    if (!result.ok) {
      stats.invalid++;
      errorLog.record(EstimationErrorCode.INVALID_REPORT, null, { line: stats.lines, issues: result.issues });
      continue;
    }

    stats.accepted++;
    stats.observationsRejected += result.rejectedObservations;
    for (let i = 0; i < result.rejectedObservations; i++) {
      errorLog.record(EstimationErrorCode.INVALID_OBSERVATION, result.report.trackerId, { line: stats.lines });
    }

    const tracked: Promise<void> = sink(result.report).then((outcome) => {
      stats.outcomes[outcome.status]++;
      pending.delete(tracked);
    });
    pending.add(tracked);

    // 한 청크의 여러 줄이 대기열을 한꺼번에 채우지 않도록 양보
    await yieldToEventLoop();
  }

  await Promise.all(pending);
  return stats;
}
