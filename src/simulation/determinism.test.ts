import { describe, expect, it } from 'vitest';
import { mulberry32, NO_INPUT } from '../__test__/match-helper.ts';
import type { MatchState } from '../types.ts';
import { angleToVector } from '../vec.ts';
import { ballOwner } from './ball.ts';
import { GOAL_BOUNDS_Y, PITCH_BOUNDS_X, PITCH_BOUNDS_Y } from './ball-physics.ts';
import { createMatch } from './match.ts';
import { stepOnce } from './update.ts';

interface BallSnapshot {
  x: number;
  y: number;
  vx: number;
  vy: number;
  owner: number;
  timer: number;
}

const RUN_SPEED = 2;

/** 選手移動は外部協調者の役割。テストでは PRNG で「ボールへ寄る / ふらつく」を混ぜる */
function movePlayers(m: MatchState, rng: () => number) {
  for (const p of m.players) {
    if (rng() < 0.3) p.dir = Math.atan2(-(m.ball.y - p.y), m.ball.x - p.x);
    else p.dir += (rng() - 0.5) * 0.5;
    const f = angleToVector(p.dir);
    p.x = Math.min(PITCH_BOUNDS_X.max, Math.max(PITCH_BOUNDS_X.min, p.x + f.x * RUN_SPEED));
    p.y = Math.min(PITCH_BOUNDS_Y.max, Math.max(PITCH_BOUNDS_Y.min, p.y + f.y * RUN_SPEED));
  }
}

function runMatch(seed: number, ticks: number): { snaps: BallSnapshot[]; changes: number } {
  const m = createMatch({ humanTeams: [false, false], difficulty: 2 });
  const rng = mulberry32(seed);
  const snaps: BallSnapshot[] = [];
  let changes = 0,
    prevOwner: number = ballOwner(m.ball);

  for (let i = 0; i < ticks; i++) {
    movePlayers(m, rng);
    stepOnce(m, NO_INPUT);
    const b = m.ball;
    const owner: number = ballOwner(b);
    if (owner !== prevOwner) changes++;
    prevOwner = owner;

    // 不変条件: 所有者は有効なインデックス、ボールはピッチ / ゴールの外へ出ない
    if (owner !== -1) expect(m.players[owner]).toBeDefined();
    expect(b.x).toBeGreaterThanOrEqual(PITCH_BOUNDS_X.min);
    expect(b.x).toBeLessThanOrEqual(PITCH_BOUNDS_X.max);
    expect(b.y).toBeGreaterThanOrEqual(GOAL_BOUNDS_Y.min);
    expect(b.y).toBeLessThanOrEqual(GOAL_BOUNDS_Y.max);
    expect(b.shadow).toEqual({ x: b.x, y: b.y });

    snaps.push({ x: b.x, y: b.y, vx: b.vx, vy: b.vy, owner, timer: b.timer });
  }
  return { snaps, changes };
}

describe('determinism', () => {
  it('同一シード → 同一結果', () => {
    const r1 = runMatch(12345, 600);
    const r2 = runMatch(12345, 600);
    expect(r1.snaps).toHaveLength(600);
    expect(r2.snaps).toEqual(r1.snaps);
  });

  it('ボールの所有者が試合中に入れ替わる', () => {
    const r = runMatch(777, 600);
    expect(r.changes).toBeGreaterThan(0);
  });

  it('異なるシードでは軌跡が変わる', () => {
    const r1 = runMatch(1, 600);
    const r2 = runMatch(2, 600);
    expect(r2.snaps).not.toEqual(r1.snaps);
  });
});
