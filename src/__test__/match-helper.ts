import { player, spawnPlayer } from '../pools.ts';
import { createBall } from '../simulation/ball.ts';
import { difficulty } from '../simulation/match.ts';
import type { TickInput } from '../simulation/update.ts';
import type { MatchState, PlayerIndex, Team } from '../types.ts';
import { NO_PLAYER } from '../types.ts';

/** 選手ゼロの試合。各テストが spawnAt で必要な選手だけ配置する。既定は CPU 対 CPU / hard */
export function makeEmptyMatch(humanTeams: readonly [boolean, boolean] = [false, false], level = 2): MatchState {
  return {
    players: [],
    teams: [
      { human: humanTeams[0], activeControlPlayer: NO_PLAYER },
      { human: humanTeams[1], activeControlPlayer: NO_PLAYER },
    ],
    ball: createBall(),
    difficulty: difficulty(level),
    accumulator: 0,
    frame: 0,
  };
}

/** timer 既定値 -1 = 即座にボール取得可能 */
export function spawnAt(m: MatchState, team: Team, x: number, y: number, dir = 0, timer = -1): PlayerIndex {
  const i = spawnPlayer(m.players, team, x, y, dir);
  player(m.players, i).timer = timer;
  return i;
}

export function placeBall(m: MatchState, x: number, y: number, vx = 0, vy = 0) {
  m.ball.x = x;
  m.ball.y = y;
  m.ball.vx = vx;
  m.ball.vy = vy;
}

export function giveBall(m: MatchState, owner: PlayerIndex) {
  m.ball.state = { kind: 'owned', owner };
}

export const NO_INPUT: TickInput = { controls: [{ shoot: false }, { shoot: false }] };

export function shootInput(team: Team): TickInput {
  return { controls: [{ shoot: team === 0 }, { shoot: team === 1 }] };
}

/** テスト用の決定的 PRNG */
export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
