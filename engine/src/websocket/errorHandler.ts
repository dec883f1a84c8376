/**
 * WebSocket 에러 핸들링
 */

import WebSocket from 'ws';
import { ErrorEvent } from '../../../shared/schemas';

/**
 * 에러 코드 정의
 */
export enum ErrorCode {
  // 메시지 관련
  INVALID_MESSAGE = 4400,
  INVALID_COMMAND = 4404,
  TRACKER_NOT_FOUND = 4410,

  // 서버 에러
  INTERNAL_ERROR = 4500,

  // 연결 관련
  TOO_MANY_CONNECTIONS = 4429,
}

/**
 * 에러 메시지 정의
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_MESSAGE]: '잘못된 메시지 형식입니다',
  [ErrorCode.INVALID_COMMAND]: '알 수 없는 명령입니다',
  [ErrorCode.TRACKER_NOT_FOUND]: '트래커를 찾을 수 없습니다',
  [ErrorCode.INTERNAL_ERROR]: '내부 서버 오류',
  [ErrorCode.TOO_MANY_CONNECTIONS]: '동시 연결 수 제한 초과',
};

/**
 * 에러 응답 생성
 */
export function createErrorResponse(
  code: ErrorCode,
  details?: Record<string, unknown>,
  timestamp: number = Date.now()
): ErrorEvent {
  return {
    type: 'error',
    code,
    message: ERROR_MESSAGES[code],
    timestamp,
    ...(details ? { details } : {}),
  };
}

/**
 * WebSocket으로 에러 전송
 */
export function sendError(
  ws: WebSocket,
  code: ErrorCode,
  details?: Record<string, unknown>
): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(createErrorResponse(code, details)));
  }
}

/**
 * WebSocket 연결 종료 (에러와 함께)
 */
export function closeWithError(ws: WebSocket, code: ErrorCode): void {
  sendError(ws, code);

  // 에러 메시지 전송 시간 확보
  setTimeout(() => {
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
      ws.close(code, ERROR_MESSAGES[code]);
    }
  }, 100);
}

/**
 * 에러 로그
 */
export function logWebSocketError(code: ErrorCode, clientId: string, detail?: string): void {
  console.error(
    `[WS Error] ${ERROR_MESSAGES[code]} (Code: ${code}, Client: ${clientId})`,
    detail ?? ''
  );
}

/**
 * Ping/Pong 하트비트 설정
 */
export function setupHeartbeat(
  ws: WebSocket,
  clientId: string,
  intervalMs: number = 30000
): { cleanup: () => void } {
  let isAlive = true;

  ws.on('pong', () => {
    isAlive = true;
  });

  const interval = setInterval(() => {
    if (!isAlive) {
      console.warn(`[WS] 하트비트 실패, 연결 종료: ${clientId}`);
      ws.terminate();
      return;
    }

    isAlive = false;
    ws.ping();
  }, intervalMs);

  return { cleanup: () => clearInterval(interval) };
}
