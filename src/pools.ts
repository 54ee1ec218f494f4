import { POOL_PLAYERS } from './constants.ts';
import type { Player, PlayerIndex, Team } from './types.ts';

// 選手は連続配列に格納し、インデックスをハンドルとして扱う。
// ボール所有者も PlayerIndex で持つため、走査中に同じスロットへの参照を二重に保持しない。

export function player(players: readonly Player[], i: number): Player {
  const p = players[i];
  if (p === undefined) throw new RangeError(`Invalid player index: ${i}`);
  return p;
}

export function spawnPlayer(players: Player[], team: Team, x: number, y: number, dir: number): PlayerIndex {
  if (players.length >= POOL_PLAYERS) throw new RangeError(`playerCount at pool limit (${POOL_PLAYERS})`);
  players.push({ team, x, y, dir, timer: 0 });
  return (players.length - 1) as PlayerIndex;
}

/** 全選手のホールドオフを 1 フレーム進める */
export function tickPlayerTimers(players: readonly Player[]) {
  for (let i = 0; i < players.length; i++) player(players, i).timer--;
}
