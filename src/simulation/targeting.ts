import { HALF_LEVEL_W, LEVEL_H } from '../constants.ts';
import { player } from '../pools.ts';
import type { MatchState, Player, PlayerIndex, Team, TargetPoint } from '../types.ts';
import { angleToVector, dot, safeNormalize } from '../vec.ts';

export const PASS_RANGE = 300;
/** cos ≈ 37° の半角コーン */
export const PASS_CONE_COS = 0.8;

/** チーム t が攻めるゴール。team ラベルは攻撃側 */
export const GOAL_TARGETS: readonly [TargetPoint, TargetPoint] = [
  { x: HALF_LEVEL_W, y: 0, team: 0 },
  { x: HALF_LEVEL_W, y: LEVEL_H, team: 1 },
];

export function goalTarget(team: Team): TargetPoint {
  return GOAL_TARGETS[team];
}

export type PassTarget =
  | { readonly kind: 'player'; readonly index: PlayerIndex }
  | { readonly kind: 'goal'; readonly team: Team };

export function targetPoint(m: MatchState, t: PassTarget): TargetPoint {
  return t.kind === 'player' ? player(m.players, t.index) : goalTarget(t.team);
}

/**
 * source から target へのパスが妥当か。
 * CPU チームのみ、target より手前で同方向にいる相手選手をインターセプトとみなして除外する
 * （人間操作チームはその判断をプレイヤーに任せる）。
 */
export function isTargetable(
  target: TargetPoint,
  source: Player,
  players: readonly Player[],
  teamIsHuman: boolean,
): boolean {
  const v0 = safeNormalize(target.x - source.x, target.y - source.y);

  if (!teamIsHuman) {
    for (let i = 0; i < players.length; i++) {
      const p = player(players, i);
      const v1 = safeNormalize(p.x - source.x, p.y - source.y);
      if (p.team !== target.team && v1.len > 0 && v1.len < v0.len && dot(v0.x, v0.y, v1.x, v1.y) > PASS_CONE_COS) {
        return false;
      }
    }
  }

  const facing = angleToVector(source.dir);
  return (
    target.team === source.team &&
    v0.len > 0 &&
    v0.len < PASS_RANGE &&
    dot(v0.x, v0.y, facing.x, facing.y) > PASS_CONE_COS
  );
}

/** 味方と攻撃ゴールのうち、targetable なものから owner に最も近いものを返す */
export function findPassTarget(m: MatchState, owner: PlayerIndex): PassTarget | null {
  const src = player(m.players, owner);
  const human = m.teams[src.team].human;
  let best: PassTarget | null = null,
    bestD2 = Infinity;

  for (let i = 0; i < m.players.length; i++) {
    const p = player(m.players, i);
    if (p.team !== src.team || !isTargetable(p, src, m.players, human)) continue;
    const d2 = (p.x - src.x) * (p.x - src.x) + (p.y - src.y) * (p.y - src.y);
    if (d2 < bestD2) {
      bestD2 = d2;
      best = { kind: 'player', index: i as PlayerIndex };
    }
  }

  const g = goalTarget(src.team);
  if (isTargetable(g, src, m.players, human)) {
    const d2 = (g.x - src.x) * (g.x - src.x) + (g.y - src.y) * (g.y - src.y);
    if (d2 < bestD2) best = { kind: 'goal', team: src.team };
  }
  return best;
}
