/**
 * 암호화 관련 타입 정의
 */

/**
 * KeyPair: 공개키-개인키 쌍과 파생 주소
 */
export interface KeyPair {
  privateKey: string;
  publicKey: string;
  address: string;
}

/**
 * RLP로 인코딩 가능한 값
 *
 * - "0x"로 시작하는 문자열은 바이트로, 나머지 문자열은 UTF-8로 인코딩된다
 * - number/bigint는 음수가 아니어야 한다
 */
export type RlpValue = string | number | bigint | Uint8Array | RlpValue[];
