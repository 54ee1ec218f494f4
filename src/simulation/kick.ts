import { KICK_STRENGTH } from '../constants.ts';
import { player } from '../pools.ts';
import type { MatchState, PlayerIndex, Team } from '../types.ts';
import { FREE, NO_PLAYER } from '../types.ts';
import { angleToVector, dist, safeNormalize } from '../vec.ts';
import { ballOwner } from './ball.ts';
import { stepsToTravel } from './ball-physics.ts';
import type { PassTarget } from './targeting.ts';
import { goalTarget, targetPoint } from './targeting.ts';

/** 蹴った直後に自分で拾い直せないフレーム数 */
export const KICKER_HOLDOFF = 10;
/** リード計算で受け手がボールなしで走る速度（px/フレーム） */
export const RECEIVER_RUN_SPEED = 3.3;
const LEAD_ITERATIONS = 8;
/** ターゲットなしキック時、操作選手を選ぶ基準点までの距離 */
const BLIND_KICK_REACH = 250;

/** 位置の「悪さ」。小さいほど攻撃側に有利 */
export type PositionCost = (x: number, y: number, team: Team) => number;

export const attackCost: PositionCost = (x, y, team) => {
  const g = goalTarget(team);
  return dist(x, y, g.x, g.y);
};

/** 人間チームは入力、CPU はホールドオフ切れかつターゲットの方が有利な位置なら蹴る */
export function wantsToKick(
  m: MatchState,
  owner: PlayerIndex,
  target: PassTarget | null,
  shoot: boolean,
  cost: PositionCost,
): boolean {
  const o = player(m.players, owner);
  if (m.teams[o.team].human) return shoot;
  if (m.ball.timer > 0 || target === null) return false;
  const t = targetPoint(m, target);
  return cost(t.x, t.y, o.team) < cost(o.x, o.y, o.team);
}

function nearestTeammate(m: MatchState, team: Team, x: number, y: number): PlayerIndex {
  let best = NO_PLAYER,
    bestD = Infinity;
  for (let i = 0; i < m.players.length; i++) {
    const p = player(m.players, i);
    if (p.team !== team) continue;
    const d = dist(p.x, p.y, x, y);
    if (d < bestD) {
      bestD = d;
      best = i as PlayerIndex;
    }
  }
  return best;
}

/**
 * 所有者がボールを蹴る。
 * 人間チームの味方へのパスは、受け手が向いている方向へ走る前提でリード位置を反復的に求める。
 */
export function kickBall(m: MatchState, target: PassTarget | null) {
  const ball = m.ball;
  const ownerIdx = ballOwner(ball);
  if (ownerIdx === NO_PLAYER) throw new RangeError('kickBall called on a free ball');
  const owner = player(m.players, ownerIdx);
  const team = m.teams[owner.team];

  let ax: number, ay: number;
  if (target !== null) {
    const t = targetPoint(m, target);
    const lead = target.kind === 'player' ? angleToVector(player(m.players, target.index).dir) : { x: 0, y: 0 };
    const iterations = team.human && target.kind === 'player' ? LEAD_ITERATIONS : 1;
    let aim = safeNormalize(t.x - ball.x, t.y - ball.y);
    for (let k = 1; k < iterations; k++) {
      const r = RECEIVER_RUN_SPEED * stepsToTravel(aim.len);
      aim = safeNormalize(t.x + lead.x * r - ball.x, t.y + lead.y * r - ball.y);
    }
    ax = aim.x;
    ay = aim.y;
    if (target.kind === 'player') team.activeControlPlayer = target.index;
  } else {
    const f = angleToVector(owner.dir);
    ax = f.x;
    ay = f.y;
    team.activeControlPlayer = nearestTeammate(
      m,
      owner.team,
      ball.x + f.x * BLIND_KICK_REACH,
      ball.y + f.y * BLIND_KICK_REACH,
    );
  }

  owner.timer = KICKER_HOLDOFF;
  ball.vx = ax * KICK_STRENGTH;
  ball.vy = ay * KICK_STRENGTH;
  ball.state = FREE;
}
