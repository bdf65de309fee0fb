/**
 * 원장 전체에서 사용되는 공통 타입 정의
 */

/**
 * Address: 계정 주소 형식
 *
 * - "0x" + 40 hex characters (20 bytes)
 * - 내부에서는 항상 소문자로 정규화해서 키로 사용
 * - 토큰 보유자, 시스템 지갑, 밸리데이터 식별에 모두 사용
 */
export type Address = string;

/**
 * Hash: Keccak-256 해시 형식
 *
 * - "0x" + 64 hex characters (32 bytes)
 * - 특권 액션 ID (actionId)에 사용
 */
export type Hash = string;

/**
 * PrivateKey: secp256k1 개인키 ("0x" + 64 hex characters)
 */
export type PrivateKey = string;

/**
 * PublicKey: 비압축 공개키 (0x04 접두사 제외, 128 hex characters)
 */
export type PublicKey = string;

/**
 * Timestamp: 초 단위 UNIX 시간
 */
export type Timestamp = number;

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열에 "0x" 접두사 추가
 */
export function addHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex : '0x' + hex;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 32 = 64 hex chars)
 */
export function isHexString(value: string, byteLength?: number): boolean {
  if (!value || typeof value !== 'string') {
    return false;
  }

  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

/**
 * 주소 검증 함수 (정확히 20바이트, 0x 접두사 필수)
 */
export function isValidAddress(address: string): boolean {
  return isHexString(address, 20);
}

/**
 * 해시 검증 함수 (정확히 32바이트, 0x 접두사 필수)
 */
export function isValidHash(hash: string): boolean {
  return isHexString(hash, 32);
}

/**
 * 개인키 검증 함수
 *
 * - 정확히 32바이트
 * - 0이 아니어야 함
 */
export function isValidPrivateKey(privateKey: string): boolean {
  if (!isHexString(privateKey, 32)) {
    return false;
  }

  return stripHexPrefix(privateKey) !== '0'.repeat(64);
}

/**
 * 주소 정규화 (소문자)
 *
 * 같은 주소가 대소문자만 다르게 들어와도 동일한 잔액/권한을 가리켜야 한다.
 */
export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}
