import { LEVEL_H, LEVEL_W, PI, PLAYERS_PER_TEAM } from '../constants.ts';
import { player, spawnPlayer } from '../pools.ts';
import type { Difficulty, MatchState, PlayerIndex } from '../types.ts';
import { NO_PLAYER, TEAMS } from '../types.ts';
import { createBall, resetBall } from './ball.ts';

export const DIFFICULTIES: readonly Difficulty[] = [
  { name: 'easy', holdoff: 120 },
  { name: 'medium', holdoff: 90 },
  { name: 'hard', holdoff: 60 },
];

// チーム 0 のキックオフ配置。チーム 1 はセンター点対称
export const FORMATION: readonly (readonly [number, number])[] = [
  [350, 550],
  [650, 450],
  [200, 850],
  [500, 750],
  [800, 950],
  [350, 1250],
  [650, 1150],
];
if (FORMATION.length !== PLAYERS_PER_TEAM)
  throw new RangeError(`FORMATION has ${FORMATION.length} entries, expected ${PLAYERS_PER_TEAM}`);

/** チーム 0 は y=0 側のゴールを攻めるので上向き、チーム 1 は下向き */
const KICKOFF_DIR: readonly [number, number] = [PI / 2, -PI / 2];

export function difficulty(level: number): Difficulty {
  const d = DIFFICULTIES[level];
  if (d === undefined) throw new RangeError(`Invalid difficulty level: ${level}`);
  return d;
}

export interface MatchOptions {
  humanTeams?: readonly [boolean, boolean];
  difficulty?: number;
}

export function createMatch(opts: MatchOptions = {}): MatchState {
  const humans = opts.humanTeams ?? [true, false];
  const m: MatchState = {
    players: [],
    teams: [
      { human: humans[0], activeControlPlayer: NO_PLAYER },
      { human: humans[1], activeControlPlayer: NO_PLAYER },
    ],
    ball: createBall(),
    difficulty: difficulty(opts.difficulty ?? 1),
    accumulator: 0,
    frame: 0,
  };

  for (const t of TEAMS) {
    let first: PlayerIndex = NO_PLAYER;
    for (const [fx, fy] of FORMATION) {
      const x = t === 0 ? fx : LEVEL_W - fx;
      const y = t === 0 ? fy : LEVEL_H - fy;
      const idx = spawnPlayer(m.players, t, x, y, KICKOFF_DIR[t]);
      if (first === NO_PLAYER) first = idx;
    }
    m.teams[t].activeControlPlayer = first;
  }
  return m;
}

/** ボールをセンターへ戻し、全選手のホールドオフを解除する */
export function kickOff(m: MatchState) {
  resetBall(m.ball);
  for (let i = 0; i < m.players.length; i++) player(m.players, i).timer = 0;
  m.accumulator = 0;
}
