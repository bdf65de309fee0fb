/**
 * 상태 직렬화 코덱 (bigint 지원 JSON)
 *
 * bigint는 { "$bigint": "123" } 형태로 저장된다.
 */

interface BigIntBox {
  $bigint: string;
}

function isBigIntBox(value: unknown): value is BigIntBox {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$bigint' in value &&
    typeof value.$bigint === 'string' &&
    Object.keys(value).length === 1
  );
}

export function encodeState(value: unknown): string {
  return JSON.stringify(value, (_key, entry: unknown) =>
    typeof entry === 'bigint' ? { $bigint: entry.toString() } : entry,
  );
}

export function decodeState<T>(raw: string): T {
  return JSON.parse(raw, (_key, entry: unknown) =>
    isBigIntBox(entry) ? BigInt(entry.$bigint) : entry,
  );
}
