/**
 * WebSocket 서버
 *
 * 위치 추정 엔진 → 지도 UI 상태 게시
 * - 연결 시 initial_state 전송
 * - 트래커 갱신마다 tracker_update 브로드캐스트
 * - get_snapshot / get_tracker 명령 응답
 */

import WebSocket, { WebSocketServer } from 'ws';
import { IncomingMessage } from 'http';
import { EngineToClientEvent } from '../../../shared/schemas';
import { TrackerStateQuery, handleClientMessage } from './commands';
import {
  ErrorCode,
  closeWithError,
  logWebSocketError,
  sendError,
  setupHeartbeat,
} from './errorHandler';

const MAX_CLIENTS = 100;

export interface StateSource extends TrackerStateQuery {
  readonly beaconCount: number;
}

function getClientId(request: IncomingMessage): string {
  const address = request.socket.remoteAddress ?? 'unknown';
  const port = request.socket.remotePort ?? 0;
  return `${address}:${port}`;
}

export class TrackerStateServer {
  private wss: WebSocketServer;
  private source: StateSource;
  private clients: Map<WebSocket, string> = new Map(); // WebSocket -> clientId
  private heartbeats: Map<WebSocket, { cleanup: () => void }> = new Map();

  constructor(port: number, source: StateSource) {
    this.source = source;
    this.wss = new WebSocketServer({ port });

    this.wss.on('connection', (ws, request) => {
      this.handleConnection(ws, request);
    });

    this.wss.on('error', (error) => {
      console.error('[Engine] WebSocket 서버 에러:', error);
    });

    console.log(`[Engine] WebSocket 서버 시작: ws://localhost:${port}`);
  }

  /**
   * 새 연결 처리
   */
  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const clientId = getClientId(request);

    if (this.clients.size >= MAX_CLIENTS) {
      logWebSocketError(ErrorCode.TOO_MANY_CONNECTIONS, clientId);
      closeWithError(ws, ErrorCode.TOO_MANY_CONNECTIONS);
      return;
    }

    console.log(`[Engine] 클라이언트 연결: ${clientId}`);
    this.clients.set(ws, clientId);
    this.heartbeats.set(ws, setupHeartbeat(ws, clientId));

    const now = Date.now();
    this.send(ws, {
      type: 'initial_state',
      timestamp: now,
      trackers: this.source.getSnapshot(now),
      beaconCount: this.source.beaconCount,
    });

    ws.on('message', (data) => {
      try {
        const response = handleClientMessage(data.toString(), this.source);
        if (response.type === 'error') {
          console.warn(`[WS] ${response.message} (Code: ${response.code}, Client: ${clientId})`);
        }
        this.send(ws, response);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logWebSocketError(ErrorCode.INTERNAL_ERROR, clientId, message);
        sendError(ws, ErrorCode.INTERNAL_ERROR);
      }
    });

    ws.on('close', (code) => {
      console.log(`[Engine] 클라이언트 연결 해제: ${clientId} (${code})`);
      this.cleanupClient(ws);
    });

    ws.on('error', (error) => {
      console.error(`[Engine] WebSocket 오류 (${clientId}):`, error.message);
      this.cleanupClient(ws);
    });
  }

  /**
   * 클라이언트 정리
   */
  private cleanupClient(ws: WebSocket): void {
    this.clients.delete(ws);
    const heartbeat = this.heartbeats.get(ws);
    if (heartbeat) {
      heartbeat.cleanup();
      this.heartbeats.delete(ws);
    }
  }

  private send(ws: WebSocket, event: EngineToClientEvent): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(event));
    }
  }

  /**
   * 모든 클라이언트에 이벤트 전송
   */
  broadcast(event: EngineToClientEvent): void {
    const message = JSON.stringify(event);
    this.clients.forEach((_clientId, ws) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(message);
      }
    });
  }

  /**
   * 서버 종료
   */
  close(): Promise<void> {
    this.clients.forEach((_clientId, ws) => {
      this.cleanupClient(ws);
      ws.terminate();
    });

    return new Promise((resolve, reject) => {
      this.wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log('[Engine] WebSocket 서버 종료');
        resolve();
      });
    });
  }
}
