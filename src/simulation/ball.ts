import { DRIBBLE_DIST_X, DRIBBLE_DIST_Y, HALF_LEVEL_H, HALF_LEVEL_W, REACQUIRE_HOLDOFF } from '../constants.ts';
import { player } from '../pools.ts';
import type { Ball, MatchState, Player, PlayerIndex } from '../types.ts';
import { FREE, NO_PLAYER } from '../types.ts';
import { angleToVector, dist } from '../vec.ts';
import { approach, axisStep, boundsX, boundsY, onPitch } from './ball-physics.ts';

/** ドリブル中にピッチ外へ出たとき、ボールに与える速度 */
export const DISPOSSESS_SPEED = 3;

export function createBall(): Ball {
  return {
    x: HALF_LEVEL_W,
    y: HALF_LEVEL_H,
    vx: 0,
    vy: 0,
    timer: 0,
    state: FREE,
    shadow: { x: HALF_LEVEL_W, y: HALF_LEVEL_H },
  };
}

/** ボールは試合中破棄されない。キックオフ時はセンターへ戻すだけ */
export function resetBall(ball: Ball) {
  ball.x = HALF_LEVEL_W;
  ball.y = HALF_LEVEL_H;
  ball.vx = 0;
  ball.vy = 0;
  ball.timer = 0;
  ball.state = FREE;
  ball.shadow.x = ball.x;
  ball.shadow.y = ball.y;
}

export function ballOwner(ball: Ball): PlayerIndex {
  return ball.state.kind === 'owned' ? ball.state.owner : NO_PLAYER;
}

/** ホールドオフ切れ、かつ DRIBBLE_DIST_X 以内（ユークリッド距離） */
export function collides(ball: Ball, p: Player): boolean {
  return p.timer < 0 && dist(p.x, p.y, ball.x, ball.y) <= DRIBBLE_DIST_X;
}

function dribble(ball: Ball, owner: Player) {
  // 所有者の少し前方を目標に、数フレームかけて寄せる
  const f = angleToVector(owner.dir);
  const nx = approach(ball.x, owner.x + DRIBBLE_DIST_X * f.x);
  const ny = approach(ball.y, owner.y + DRIBBLE_DIST_Y * f.y);

  if (onPitch(nx, ny)) {
    ball.x = nx;
    ball.y = ny;
    return;
  }
  // ピッチ外 → ボールを失う。位置はそのまま、向きに沿って小さく転がす
  owner.timer = REACQUIRE_HOLDOFF;
  ball.vx = f.x * DISPOSSESS_SPEED;
  ball.vy = f.y * DISPOSSESS_SPEED;
  ball.state = FREE;
}

function roll(ball: Ball) {
  // 各軸の境界は「もう一方の軸」の現在位置で決まる（ゴールマウス形状）
  const bx = boundsX(ball.y);
  const by = boundsY(ball.x);
  const sx = axisStep(ball.x, ball.vx, bx);
  ball.x = sx.pos;
  ball.vx = sx.vel;
  const sy = axisStep(ball.y, ball.vy, by);
  ball.y = sy.pos;
  ball.vy = sy.vel;
}

/**
 * 取得判定。所有者コンテキストは候補ごとに読み直す:
 * 同一フレーム内で所有者が変わったら、以降の「相手チームか」判定は新しい所有者基準。
 * 同時に複数候補がいる場合はプール順で先の選手が優先。
 */
function scanAcquisition(m: MatchState) {
  const ball = m.ball;
  for (let i = 0; i < m.players.length; i++) {
    const cand = player(m.players, i);
    const ownerIdx = ballOwner(ball);
    if (ownerIdx !== NO_PLAYER && player(m.players, ownerIdx).team === cand.team) continue;
    if (!collides(ball, cand)) continue;

    if (ownerIdx !== NO_PLAYER) player(m.players, ownerIdx).timer = REACQUIRE_HOLDOFF;
    ball.timer = m.difficulty.holdoff;
    ball.state = { kind: 'owned', owner: i as PlayerIndex };
    m.teams[cand.team].activeControlPlayer = i as PlayerIndex;
  }
}

export function updateBall(m: MatchState) {
  const ball = m.ball;
  ball.timer--;

  if (ball.state.kind === 'owned') dribble(ball, player(m.players, ball.state.owner));
  else roll(ball);

  if (!Number.isFinite(ball.x) || !Number.isFinite(ball.y))
    throw new RangeError(`ball position is not finite: ${ball.x}, ${ball.y}`);

  ball.shadow.x = ball.x;
  ball.shadow.y = ball.y;

  scanAcquisition(m);
}
