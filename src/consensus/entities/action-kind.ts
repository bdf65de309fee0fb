/**
 * 특권 액션 종류
 *
 * 모든 항목이 합의 게이트를 거친다.
 * TIMELOCKED_ACTIONS에 속한 액션은 그 전에 타임락도 거친다.
 */
export const ACTION_KINDS = [
  'setFeeRates',
  'setFeeExemption',
  'addValidator',
  'removeValidator',
  'slashValidator',
  'setRequiredConfirmations',
  'setMaxMissedConfirmations',
  'setRewardRate',
  'setPerformanceFeeRate',
  'setProposalFee',
  'setVotingFee',
  'pause',
  'unpause',
  'buybackAndBurn',
  'upgrade',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export const TIMELOCKED_ACTIONS: readonly ActionKind[] = ['pause', 'upgrade'];

export function isTimelocked(kind: ActionKind): boolean {
  return TIMELOCKED_ACTIONS.includes(kind);
}

/**
 * 액션 파라미터 (해싱 전 문자열로 정규화됨)
 */
export type ActionParam = string | number | bigint | boolean;

/**
 * 파라미터를 저장/해싱용 문자열로 변환
 *
 * - 숫자, bigint: 10진수 문자열
 * - boolean: "true" / "false"
 * - 문자열 (주소 등): 소문자
 */
export function encodeActionParams(params: readonly ActionParam[]): string[] {
  return params.map((param) =>
    typeof param === 'string' ? param.toLowerCase() : String(param),
  );
}
