/**
 * 클라이언트 명령 처리
 *
 * 수신 문자열 → 응답 이벤트. 소켓과 분리되어 있어 단독으로 호출할 수 있다.
 */

import { z } from 'zod';
import {
  ClientToEngineCommand,
  EngineToClientEvent,
  TrackerStateSnapshot,
} from '../../../shared/schemas';
import { ErrorCode, createErrorResponse } from './errorHandler';

/** 게시 상태 조회 인터페이스 (조정기가 구현) */
export interface TrackerStateQuery {
  getSnapshot(now?: number): TrackerStateSnapshot[];
  getTrackerState(trackerId: string, now?: number): TrackerStateSnapshot | null;
}

const KNOWN_COMMANDS = ['get_snapshot', 'get_tracker'] as const;

const clientCommandSchema: z.ZodType<ClientToEngineCommand> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('get_snapshot') }),
  z.object({ type: z.literal('get_tracker'), tracker_id: z.string().min(1) }),
]);

function parseJson(data: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(data) };
  } catch (error) {
    if (error instanceof SyntaxError) return { ok: false };
    throw error;
  }
}

function commandType(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('type' in value)) return null;
  return typeof value.type === 'string' ? value.type : null;
}

/**
 * 클라이언트 메시지 처리
 */
export function handleClientMessage(
  data: string,
  query: TrackerStateQuery,
  now: number = Date.now()
): EngineToClientEvent {
  const parsed = parseJson(data);
  if (!parsed.ok) {
    return createErrorResponse(ErrorCode.INVALID_MESSAGE, { reason: 'JSON 파싱 실패' }, now);
  }

  const type = commandType(parsed.value);
  if (type !== null && !KNOWN_COMMANDS.some((known) => known === type)) {
    return createErrorResponse(ErrorCode.INVALID_COMMAND, { type }, now);
  }

  const command = clientCommandSchema.safeParse(parsed.value);
  if (!command.success) {
    return createErrorResponse(
      ErrorCode.INVALID_MESSAGE,
      { reason: command.error.issues.map((issue) => issue.message).join('; ') },
      now
    );
  }

  switch (command.data.type) {
    case 'get_snapshot':
      return { type: 'snapshot', timestamp: now, trackers: query.getSnapshot(now) };

    case 'get_tracker': {
      const tracker = query.getTrackerState(command.data.tracker_id, now);
      if (!tracker) {
        return createErrorResponse(ErrorCode.TRACKER_NOT_FOUND, { tracker_id: command.data.tracker_id }, now);
      }
      return { type: 'tracker_state', timestamp: now, tracker };
    }
  }
}
