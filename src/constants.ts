// ── 配置基準 ──
// ここには「複数レイヤーから参照される定数」のみを置く。
//   例: ball + targeting + match の全てが使うピッチ寸法、ドラッグ係数、キック強度
// 単一モジュール（+ そのテスト）でしか使わないロジック固有の倍率・閾値は、そのモジュール内に定義する。
//   例: PASS_RANGE → targeting.ts, RECEIVER_RUN_SPEED → kick.ts

export const POOL_PLAYERS = 14;
export const PLAYERS_PER_TEAM = 7;

/** 1 フレーム = 1 物理ステップ。速度は「px/フレーム」、タイマーは「フレーム数」 */
export const REF_FPS = 60;
export const PI = Math.PI;

// ── Level / pitch geometry ──
export const LEVEL_W = 1000;
export const LEVEL_H = 1400;
export const HALF_LEVEL_W = LEVEL_W / 2;
export const HALF_LEVEL_H = LEVEL_H / 2;

export const HALF_PITCH_W = 442;
export const HALF_PITCH_H = 622;

export const GOAL_WIDTH = 186;
export const GOAL_DEPTH = 20;
export const HALF_GOAL_W = GOAL_WIDTH / 2;

// ── Ball physics ──
/** フレーム毎の速度減衰（両軸共通） */
export const DRAG = 0.98;
export const KICK_STRENGTH = 11.5;

// ドリブル時のボール位置は楕円上（斜め見下ろし視点のため Y を短く取る）
export const DRIBBLE_DIST_X = 18;
export const DRIBBLE_DIST_Y = 16;

/** ボールを失った直後、同じ選手が再取得できないフレーム数 */
export const REACQUIRE_HOLDOFF = 60;

if (!(DRAG > 0 && DRAG < 1)) throw new RangeError(`DRAG must be in (0, 1): ${DRAG}`);
if (KICK_STRENGTH <= 0) throw new RangeError(`KICK_STRENGTH must be positive: ${KICK_STRENGTH}`);
if (DRIBBLE_DIST_X <= 0 || DRIBBLE_DIST_Y <= 0)
  throw new RangeError(`dribble distance must be positive: ${DRIBBLE_DIST_X}, ${DRIBBLE_DIST_Y}`);
if (HALF_GOAL_W >= HALF_PITCH_W) throw new RangeError('goal mouth wider than pitch');
if (POOL_PLAYERS < PLAYERS_PER_TEAM * 2) throw new RangeError(`POOL_PLAYERS too small: ${POOL_PLAYERS}`);
