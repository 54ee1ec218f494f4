import { REF_FPS } from '../constants.ts';
import { devWarn } from '../log.ts';
import { player, tickPlayerTimers } from '../pools.ts';
import type { MatchState } from '../types.ts';
import { NO_PLAYER } from '../types.ts';
import { ballOwner, updateBall } from './ball.ts';
import type { PositionCost } from './kick.ts';
import { attackCost, kickBall, wantsToKick } from './kick.ts';
import { findPassTarget } from './targeting.ts';

export const MAX_STEPS_PER_FRAME = 8;
// 0.05s を 1/60 で割ると 2.9999… になるため、フレーム数の切り捨て前に足す
const FRAME_EPSILON = 1e-6;

export interface TeamControls {
  /** 人間チームのキック入力。CPU チームでは無視される */
  shoot: boolean;
}

export interface TickInput {
  controls: readonly [TeamControls, TeamControls];
  /** CPU のキック判断に使う位置コスト。省略時は攻撃ゴールまでの距離 */
  cost?: PositionCost;
}

/** 1 フレーム分。選手タイマー → ボール → キック判定の順（フレーム内で中断しない） */
export function stepOnce(m: MatchState, input: TickInput) {
  tickPlayerTimers(m.players);
  updateBall(m);

  const ownerIdx = ballOwner(m.ball);
  if (ownerIdx !== NO_PLAYER) {
    const owner = player(m.players, ownerIdx);
    const target = findPassTarget(m, ownerIdx);
    if (wantsToKick(m, ownerIdx, target, input.controls[owner.team].shoot, input.cost ?? attackCost)) {
      kickBall(m, target);
    }
  }
  m.frame++;
}

/**
 * 固定タイムステップ（REF_FPS）で rawDt 秒分のフレームを進める。
 * 溜まりすぎた分は MAX_STEPS_PER_FRAME で打ち切って捨てる。戻り値は実行したフレーム数。
 * rawDt が負・NaN・Infinity なら accumulator を汚す前に RangeError。
 */
export function update(m: MatchState, rawDt: number, input: TickInput): number {
  if (!(rawDt >= 0) || !Number.isFinite(rawDt)) throw new RangeError(`Invalid rawDt: ${rawDt}`);
  m.accumulator += rawDt;
  let steps = Math.floor(m.accumulator * REF_FPS + FRAME_EPSILON);
  if (steps > MAX_STEPS_PER_FRAME) {
    devWarn(`dropping ${steps - MAX_STEPS_PER_FRAME} frame(s) of backlog at frame ${m.frame}`);
    steps = MAX_STEPS_PER_FRAME;
    m.accumulator = 0;
  } else {
    m.accumulator = Math.max(0, m.accumulator - steps / REF_FPS);
  }
  for (let s = 0; s < steps; s++) stepOnce(m, input);
  return steps;
}
