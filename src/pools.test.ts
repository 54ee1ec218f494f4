import { describe, expect, it } from 'vitest';
import { POOL_PLAYERS } from './constants.ts';
import { player, spawnPlayer, tickPlayerTimers } from './pools.ts';
import type { Player } from './types.ts';

describe('spawnPlayer', () => {
  it('連番のインデックスを返し timer は 0 で初期化', () => {
    const players: Player[] = [];
    const a = spawnPlayer(players, 0, 100, 200, 0);
    const b = spawnPlayer(players, 1, 300, 400, Math.PI);
    expect(a).toBe(0);
    expect(b).toBe(1);
    expect(player(players, b)).toEqual({ team: 1, x: 300, y: 400, dir: Math.PI, timer: 0 });
  });

  it('POOL_PLAYERS到達でRangeError', () => {
    const players: Player[] = [];
    for (let i = 0; i < POOL_PLAYERS; i++) spawnPlayer(players, 0, 0, 0, 0);
    expect(() => spawnPlayer(players, 1, 0, 0, 0)).toThrow(RangeError);
    expect(players).toHaveLength(POOL_PLAYERS);
  });
});

describe('player', () => {
  it('範囲外インデックスでRangeError', () => {
    const players: Player[] = [];
    spawnPlayer(players, 0, 0, 0, 0);
    expect(() => player(players, 1)).toThrow(RangeError);
    expect(() => player(players, -1)).toThrow(RangeError);
  });
});

describe('tickPlayerTimers', () => {
  it('全選手の timer を 1 減らす', () => {
    const players: Player[] = [];
    spawnPlayer(players, 0, 0, 0, 0);
    spawnPlayer(players, 1, 0, 0, 0);
    player(players, 1).timer = 60;
    tickPlayerTimers(players);
    expect(player(players, 0).timer).toBe(-1);
    expect(player(players, 1).timer).toBe(59);
  });
});
