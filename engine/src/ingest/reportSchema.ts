/**
 * 트래커 보고 정규화 (수집 경계)
 *
 * 전송 계층이 디코딩한 JSON 객체를 엔진 내부 TrackerReport로 변환한다.
 * 별칭 필드(deviceId → macAddress)는 여기서만 처리하고, 이후 코어는 정규 키만 사용한다.
 * 식별자가 없는 관측은 해당 관측만 버리고 보고는 계속 처리한다.
 */

import { z } from 'zod';
import { DetectedBeacon, TrackerReport } from '../../../shared/schemas';
import { identityKeys } from '../core/registry/beaconKey';
import { formatZodIssues } from '../config/estimationConfig';

const reportEnvelopeSchema = z.object({
  trackerId: z.string().trim().min(1, { message: 'trackerId는 비어 있을 수 없습니다' }),
  timestamp: z.number().int().nonnegative(),
  detectedBeacons: z.array(z.unknown()).default([]),
});

export const detectedBeaconSchema = z
  .object({
    macAddress: z.string().trim().min(1).optional(),
    deviceId: z.string().trim().min(1).optional(),
    uuid: z.string().trim().min(1).optional(),
    major: z.number().int().nonnegative().nullable().optional(),
    minor: z.number().int().nonnegative().nullable().optional(),
    rssi: z.number(),
  })
  .transform((raw, ctx): DetectedBeacon => {
    const fields = {
      macAddress: raw.macAddress ?? raw.deviceId ?? null,
      uuid: raw.uuid ?? null,
      major: raw.major ?? null,
      minor: raw.minor ?? null,
    };
    const keys = identityKeys(fields);
    if (keys.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'macAddress(deviceId) 또는 uuid+major+minor가 필요합니다',
      });
      return z.NEVER;
    }
    return { beaconKey: keys[0], ...fields, rssi: raw.rssi };
  });

export type NormalizeResult =
  | { ok: true; report: TrackerReport; rejectedObservations: number }
  | { ok: false; issues: string[] };

/**
 * 원시 보고 정규화
 */
export function normalizeTrackerReport(raw: unknown): NormalizeResult {
  const envelope = reportEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, issues: formatZodIssues(envelope.error) };
  }

  const detectedBeacons: DetectedBeacon[] = [];
  let rejectedObservations = 0;
  for (const item of envelope.data.detectedBeacons) {
    const parsed = detectedBeaconSchema.safeParse(item);
    if (parsed.success) {
      detectedBeacons.push(parsed.data);
    } else {
      rejectedObservations++;
    }
  }

  return {
    ok: true,
    report: {
      trackerId: envelope.data.trackerId,
      timestamp: envelope.data.timestamp,
      detectedBeacons,
    },
    rejectedObservations,
  };
}
