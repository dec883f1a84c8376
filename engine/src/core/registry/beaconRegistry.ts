/**
 * 비콘 레지스트리
 *
 * 비콘 식별자 → 좌표/보정값 매핑.
 * 재로드는 새 인덱스를 완성한 뒤 참조 하나만 교체하므로
 * 읽는 쪽은 항상 이전 집합 전체 또는 새 집합 전체만 본다.
 */

import { identityKeys } from './beaconKey';
import { InvalidConfigurationError } from '../errors';

/** 비콘 (로드 후 불변) */
export interface Beacon {
  /** 대표 키 (MAC 키 우선) */
  id: string;
  macAddress: string | null;
  uuid: string | null;
  major: number | null;
  minor: number | null;
  /** 좌표 (m) */
  x: number;
  y: number;
  /** 1m 거리 RSSI */
  txPower: number;
  name: string | null;
}

export type BeaconInput = Omit<Beacon, 'id'>;

/**
 * 레지스트리 스냅샷 (불변)
 */
export class RegistrySnapshot {
  readonly version: number;
  private readonly index: ReadonlyMap<string, Beacon>;
  private readonly beacons: readonly Beacon[];

  constructor(version: number, beacons: readonly Beacon[], index: ReadonlyMap<string, Beacon>) {
    this.version = version;
    this.beacons = beacons;
    this.index = index;
  }

  get size(): number {
    return this.beacons.length;
  }

  /**
   * 키로 비콘 조회 (없으면 null)
   */
  lookup(beaconKey: string): Beacon | null {
    return this.index.get(beaconKey) ?? null;
  }

  list(): readonly Beacon[] {
    return this.beacons;
  }
}

/**
 * 비콘 목록으로 스냅샷 생성
 *
 * @throws InvalidConfigurationError 식별자가 없거나 중복일 때
 */
export function buildRegistrySnapshot(inputs: readonly BeaconInput[], version: number): RegistrySnapshot {
  const index = new Map<string, Beacon>();
  const beacons: Beacon[] = [];
  const issues: string[] = [];

  inputs.forEach((input, i) => {
    const keys = identityKeys(input);
    if (keys.length === 0) {
      issues.push(`beacons.${i}: macAddress 또는 uuid+major+minor가 필요합니다`);
      return;
    }
    if (!Number.isFinite(input.x) || !Number.isFinite(input.y) || !Number.isFinite(input.txPower)) {
      issues.push(`beacons.${i}: 좌표와 txPower는 유한한 숫자여야 합니다`);
      return;
    }

    const beacon: Beacon = Object.freeze({ ...input, id: keys[0] });
    for (const key of keys) {
      if (index.has(key)) {
        issues.push(`beacons.${i}: 중복된 비콘 식별자 ${key}`);
        continue;
      }
      index.set(key, beacon);
    }
    beacons.push(beacon);
  });

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  return new RegistrySnapshot(version, Object.freeze(beacons), index);
}

export class BeaconRegistry {
  private active: RegistrySnapshot;

  constructor(beacons: readonly BeaconInput[] = []) {
    this.active = buildRegistrySnapshot(beacons, 1);
  }

  /**
   * 현재 스냅샷 (보고 하나를 처리하는 동안 이 참조를 고정해서 사용)
   */
  snapshot(): RegistrySnapshot {
    return this.active;
  }

  lookup(beaconKey: string): Beacon | null {
    return this.active.lookup(beaconKey);
  }

  get size(): number {
    return this.active.size;
  }

  get version(): number {
    return this.active.version;
  }

  list(): readonly Beacon[] {
    return this.active.list();
  }

  /**
   * 비콘 집합 교체
   *
   * 검증에 실패하면 기존 집합을 그대로 유지한다.
   */
  reload(beacons: readonly BeaconInput[]): RegistrySnapshot {
    const next = buildRegistrySnapshot(beacons, this.active.version + 1);
    this.active = next;
    console.log(`[BeaconRegistry] 비콘 ${next.size}개 로드 (v${next.version})`);
    return next;
  }
}
