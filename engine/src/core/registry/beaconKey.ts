/**
 * 비콘 식별자 정규화
 *
 * MAC 주소와 iBeacon(uuid+major+minor) 두 가지 식별 방식을 하나의 문자열 키로 통일한다.
 */

const MAC_PREFIX = 'mac:';
const IBEACON_PREFIX = 'ibeacon:';

/**
 * MAC 주소 키 (대문자, 구분자 ':')
 */
export function macBeaconKey(macAddress: string): string {
  return MAC_PREFIX + macAddress.trim().toUpperCase().replace(/-/g, ':');
}

/**
 * iBeacon 키 (uuid 소문자)
 */
export function iBeaconKey(uuid: string, major: number, minor: number): string {
  return `${IBEACON_PREFIX}${uuid.trim().toLowerCase()}:${major}:${minor}`;
}

export interface BeaconIdentityFields {
  macAddress?: string | null;
  uuid?: string | null;
  major?: number | null;
  minor?: number | null;
}

/**
 * 식별 필드에서 가능한 모든 키 생성 (MAC 우선)
 */
export function identityKeys(fields: BeaconIdentityFields): string[] {
  const keys: string[] = [];
  if (fields.macAddress) {
    keys.push(macBeaconKey(fields.macAddress));
  }
  if (fields.uuid && fields.major != null && fields.minor != null) {
    keys.push(iBeaconKey(fields.uuid, fields.major, fields.minor));
  }
  return keys;
}
