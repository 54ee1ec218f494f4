import type { Vec2 } from './types.ts';

const NORMALIZE_EPSILON = 1e-9;

export interface Normalized {
  x: number;
  y: number;
  len: number;
}

/**
 * 単位ベクトルと長さを返す。長さがほぼ 0 のときは (0, 0) と len = 0。
 * 呼び出し側は len = 0 を「同一点 / 方向なし」として扱い、dot 判定をスキップすること。
 */
export function safeNormalize(x: number, y: number): Normalized {
  const len = Math.sqrt(x * x + y * y);
  if (len < NORMALIZE_EPSILON) return { x: 0, y: 0, len: 0 };
  return { x: x / len, y: y / len, len };
}

/** 0 rad = +X。y-down 画面で反時計回りになるよう y を反転する */
export function angleToVector(theta: number): Vec2 {
  return { x: Math.cos(theta), y: -Math.sin(theta) };
}

export function dot(ax: number, ay: number, bx: number, by: number): number {
  return ax * bx + ay * by;
}

export function dist(ax: number, ay: number, bx: number, by: number): number {
  const dx = ax - bx,
    dy = ay - by;
  return Math.sqrt(dx * dx + dy * dy);
}
