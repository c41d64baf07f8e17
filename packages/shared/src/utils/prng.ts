/**
 * 시드 기반 난수 생성기
 *
 * 선택 로직을 테스트에서 재현 가능하게 만들기 위해 사용
 */

export type RandomSource = () => number;

/**
 * Mulberry32 PRNG, [0, 1) 범위의 값을 반환하는 함수 생성
 * @see https://github.com/bryc/code/blob/master/jshash/PRNGs.md
 */
export function createMulberry32(seed: number): RandomSource {
  if (!Number.isFinite(seed)) {
    throw new Error('Seed must be a finite number');
  }
  let state = seed;
  return function (): number {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * 배열에서 균등하게 하나 선택 (빈 배열이면 undefined)
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}
