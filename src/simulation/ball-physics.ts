import {
  DRAG,
  GOAL_DEPTH,
  GOAL_WIDTH,
  HALF_GOAL_W,
  HALF_LEVEL_H,
  HALF_LEVEL_W,
  HALF_PITCH_H,
  HALF_PITCH_W,
  KICK_STRENGTH,
} from '../constants.ts';
import type { Bounds } from '../types.ts';

export const PITCH_BOUNDS_X: Bounds = { min: HALF_LEVEL_W - HALF_PITCH_W, max: HALF_LEVEL_W + HALF_PITCH_W };
export const PITCH_BOUNDS_Y: Bounds = { min: HALF_LEVEL_H - HALF_PITCH_H, max: HALF_LEVEL_H + HALF_PITCH_H };

export const GOAL_BOUNDS_X: Bounds = { min: HALF_LEVEL_W - HALF_GOAL_W, max: HALF_LEVEL_W + HALF_GOAL_W };
export const GOAL_BOUNDS_Y: Bounds = {
  min: HALF_LEVEL_H - HALF_PITCH_H - GOAL_DEPTH,
  max: HALF_LEVEL_H + HALF_PITCH_H + GOAL_DEPTH,
};

/** この速度を下回ったら停止扱い（stepsToTravel の打ち切り） */
export const MIN_STEP_SPEED = 0.25;

interface Rect {
  left: number;
  top: number;
  w: number;
  h: number;
}

const PITCH_RECT: Rect = { left: PITCH_BOUNDS_X.min, top: PITCH_BOUNDS_Y.min, w: HALF_PITCH_W * 2, h: HALF_PITCH_H * 2 };
const GOAL_0_RECT: Rect = { left: GOAL_BOUNDS_X.min, top: GOAL_BOUNDS_Y.min, w: GOAL_WIDTH, h: GOAL_DEPTH };
const GOAL_1_RECT: Rect = {
  left: GOAL_BOUNDS_X.min,
  top: GOAL_BOUNDS_Y.max - GOAL_DEPTH,
  w: GOAL_WIDTH,
  h: GOAL_DEPTH,
};

// 右端・下端は含まない（半開区間）
function inRect(r: Rect, x: number, y: number): boolean {
  return x >= r.left && x < r.left + r.w && y >= r.top && y < r.top + r.h;
}

/** ドリブル中のみ使用。ピッチ矩形 ∪ 両ゴール矩形 */
export function onPitch(x: number, y: number): boolean {
  return inRect(PITCH_RECT, x, y) || inRect(GOAL_0_RECT, x, y) || inRect(GOAL_1_RECT, x, y);
}

// GC回避: axisStep() の結果を再利用するシングルトン（呼び出し直後に読み出すこと）
const _step = { pos: 0, vel: 0 };

/**
 * 1 軸分の物理ステップ。境界を越える移動は取り消して速度を反転し、最後にドラッグを掛ける。
 * 壁を貫通せずその場で跳ね返る（完全弾性で進み続けるわけではない）。
 * 戻り値は共有シングルトンなので、次の呼び出しで上書きされる。呼び出し直後に読み出すこと。
 */
export function axisStep(pos: number, vel: number, bounds: Bounds): Readonly<{ pos: number; vel: number }> {
  let p = pos + vel,
    v = vel;
  if (p < bounds.min || p > bounds.max) {
    p -= v;
    v = -v;
  }
  _step.pos = p;
  _step.vel = v * DRAG;
  return _step;
}

/** ボールが縦方向にゴール内にいる間は、横はゴールの側面までしか動けない */
export function boundsX(y: number): Bounds {
  return Math.abs(y - HALF_LEVEL_H) > HALF_PITCH_H ? GOAL_BOUNDS_X : PITCH_BOUNDS_X;
}

/** ボールが横方向にゴールマウス内なら、縦はネットの奥まで行ける */
export function boundsY(x: number): Bounds {
  return Math.abs(x - HALF_LEVEL_W) < HALF_GOAL_W ? GOAL_BOUNDS_Y : PITCH_BOUNDS_Y;
}

/** 差が 1 未満ならスナップ、それ以外は中点（漸近的なジッタを防ぐ） */
export function approach(a: number, b: number): number {
  return Math.abs(b - a) < 1 ? b : (a + b) / 2;
}

/** KICK_STRENGTH で蹴ったボールが distance を進むのに要するステップ数 */
export function stepsToTravel(distance: number): number {
  let d = distance,
    steps = 0,
    vel = KICK_STRENGTH;
  while (d > 0 && vel > MIN_STEP_SPEED) {
    d -= vel;
    steps++;
    vel *= DRAG;
  }
  return steps;
}
