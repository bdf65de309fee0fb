import { Injectable } from '@nestjs/common';
import { ec as EC } from 'elliptic';
import keccak from 'keccak';
import { RLP } from '@ethereumjs/rlp';
import { hexToBytes } from '@ethereumjs/util';
import {
  addHexPrefix,
  Address,
  Hash,
  isValidPrivateKey,
  PrivateKey,
  PublicKey,
  stripHexPrefix,
} from '../types/common.types';
import { KeyPair, RlpValue } from './crypto.types';

/**
 * CryptoService
 *
 * 원장에서 쓰는 암호화 기능:
 * - Keccak-256 해싱 (액션 ID, 배포 주소 파생)
 * - RLP 인코딩 (해싱 입력의 결정적 직렬화)
 * - secp256k1 키 쌍 생성 (지갑 생성 API)
 */
@Injectable()
export class CryptoService {
  private readonly ec: EC;

  constructor() {
    this.ec = new EC('secp256k1');
  }

  /**
   * Keccak-256 해시 (바이트 입력)
   *
   * @returns "0x" + 64 hex characters
   */
  hashBuffer(buffer: Uint8Array): Hash {
    const hash = keccak('keccak256').update(Buffer.from(buffer)).digest('hex');
    return addHexPrefix(hash);
  }

  rlpEncode(value: RlpValue): Uint8Array {
    return RLP.encode(value);
  }

  /**
   * 값 목록을 RLP로 직렬화한 뒤 Keccak-256 해시
   *
   * 같은 입력은 항상 같은 해시를 만든다 (액션 ID 파생에 사용).
   */
  hashRlp(values: RlpValue[]): Hash {
    return this.hashBuffer(this.rlpEncode(values));
  }

  /**
   * 해시의 마지막 20바이트로 주소 파생
   */
  hashToAddress(hash: Hash): Address {
    return addHexPrefix(stripHexPrefix(hash).slice(-40));
  }

  /**
   * 새 키 쌍 생성
   *
   * 주소 = Keccak-256(공개키)의 마지막 20바이트
   */
  generateKeyPair(): KeyPair {
    const keyPair = this.ec.genKeyPair();
    const privateKey = addHexPrefix(
      keyPair.getPrivate('hex').padStart(64, '0'),
    );
    const publicKey = this.privateKeyToPublicKey(privateKey);

    return {
      privateKey,
      publicKey,
      address: this.publicKeyToAddress(publicKey),
    };
  }

  /**
   * 개인키로부터 공개키 생성 (비압축, 0x04 접두사 제외)
   */
  privateKeyToPublicKey(privateKey: PrivateKey): PublicKey {
    if (!isValidPrivateKey(privateKey)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    return keyPair.getPublic('hex').slice(2);
  }

  publicKeyToAddress(publicKey: PublicKey): Address {
    const hash = this.hashBuffer(hexToBytes(addHexPrefix(publicKey)));
    return this.hashToAddress(hash);
  }

  privateKeyToAddress(privateKey: PrivateKey): Address {
    return this.publicKeyToAddress(this.privateKeyToPublicKey(privateKey));
  }
}
