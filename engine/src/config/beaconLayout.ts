/**
 * 비콘 배치 파일 로더
 *
 * 지도 편집기에서 내보낸 JSON ({ beacons, settings, map })을 읽는다.
 * - macAddress / deviceId, name / displayName 별칭을 정규 필드로 통일
 * - iBeacon(uuid+major+minor) 형식 지원
 * - map 엔티티 등 나머지 키는 무시
 */

import * as fs from 'fs';
import { z } from 'zod';
import { BeaconInput } from '../core/registry/beaconRegistry';
import { InvalidConfigurationError } from '../core/errors';
import { formatZodIssues, propagationFactorSchema } from './estimationConfig';

const optionalText = z.string().trim().min(1).nullable().optional();
const optionalId = z.number().int().nonnegative().nullable().optional();

export const beaconEntrySchema = z
  .object({
    macAddress: optionalText,
    deviceId: optionalText,
    uuid: optionalText,
    major: optionalId,
    minor: optionalId,
    name: optionalText,
    displayName: optionalText,
    txPower: z.number().int(),
    x: z.number(),
    y: z.number(),
  })
  .transform((raw): BeaconInput => ({
    macAddress: raw.macAddress ?? raw.deviceId ?? null,
    uuid: raw.uuid ?? null,
    major: raw.major ?? null,
    minor: raw.minor ?? null,
    name: raw.name ?? raw.displayName ?? null,
    txPower: raw.txPower,
    x: raw.x,
    y: raw.y,
  }));

export const beaconLayoutSchema = z.object({
  beacons: z.array(beaconEntrySchema).default([]),
  settings: z
    .object({
      signalPropagationFactor: propagationFactorSchema.default(2.5),
    })
    .default({}),
});

export interface BeaconLayout {
  beacons: BeaconInput[];
  signalPropagationFactor: number;
}

/**
 * 배치 객체 검증
 *
 * @throws InvalidConfigurationError
 */
export function parseBeaconLayout(raw: unknown): BeaconLayout {
  const result = beaconLayoutSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigurationError(formatZodIssues(result.error));
  }
  return {
    beacons: result.data.beacons,
    signalPropagationFactor: result.data.settings.signalPropagationFactor,
  };
}

/**
 * 배치 파일 로드 (파일이 없으면 null)
 *
 * @throws InvalidConfigurationError 읽기/파싱/검증 실패 시
 */
export function loadBeaconLayout(filePath: string): BeaconLayout | null {
  if (!fs.existsSync(filePath)) {
    console.warn(`[BeaconLayout] 배치 파일 없음: ${filePath}`);
    return null;
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError([`${filePath}: 파일 읽기 실패 (${message})`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError([`${filePath}: JSON 파싱 실패 (${message})`]);
  }

  const layout = parseBeaconLayout(raw);
  console.log(`[BeaconLayout] 비콘 ${layout.beacons.length}개 로드: ${filePath}`);
  return layout;
}
