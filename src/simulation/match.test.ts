import { describe, expect, it } from 'vitest';
import { PLAYERS_PER_TEAM, POOL_PLAYERS } from '../constants.ts';
import { player } from '../pools.ts';
import { createBall } from './ball.ts';
import { onPitch } from './ball-physics.ts';
import { createMatch, DIFFICULTIES, difficulty, FORMATION, kickOff } from './match.ts';

describe('difficulty', () => {
  it('レベル毎のホールドオフ', () => {
    expect(DIFFICULTIES.map((d) => d.holdoff)).toEqual([120, 90, 60]);
    expect(difficulty(2).name).toBe('hard');
  });

  it('範囲外レベルは RangeError', () => {
    expect(() => difficulty(3)).toThrow(RangeError);
    expect(() => difficulty(-1)).toThrow(RangeError);
  });
});

describe('createMatch', () => {
  it('FORMATION はチーム人数分', () => {
    expect(FORMATION).toHaveLength(PLAYERS_PER_TEAM);
  });

  it('既定: 人間 vs CPU、medium、7 人ずつ', () => {
    const m = createMatch();
    expect(m.players).toHaveLength(POOL_PLAYERS);
    expect(m.players.filter((p) => p.team === 0)).toHaveLength(PLAYERS_PER_TEAM);
    expect(m.teams[0].human).toBe(true);
    expect(m.teams[1].human).toBe(false);
    expect(m.difficulty.holdoff).toBe(90);
    expect(m.ball).toEqual(createBall());
    expect(m.frame).toBe(0);
  });

  it('チーム 1 はセンター点対称で逆向き', () => {
    const m = createMatch();
    expect(player(m.players, 0)).toEqual({ team: 0, x: 350, y: 550, dir: Math.PI / 2, timer: 0 });
    expect(player(m.players, 7)).toEqual({ team: 1, x: 650, y: 850, dir: -Math.PI / 2, timer: 0 });
  });

  it('各チームの先頭選手が初期の操作選手', () => {
    const m = createMatch();
    expect(m.teams[0].activeControlPlayer).toBe(0);
    expect(m.teams[1].activeControlPlayer).toBe(7);
  });

  it('全選手がピッチ内に配置される', () => {
    const m = createMatch();
    for (const p of m.players) expect(onPitch(p.x, p.y)).toBe(true);
  });

  it('オプション指定', () => {
    const m = createMatch({ humanTeams: [false, true], difficulty: 0 });
    expect(m.teams[0].human).toBe(false);
    expect(m.teams[1].human).toBe(true);
    expect(m.difficulty.holdoff).toBe(120);
  });

  it('不正な難易度は初期化時に RangeError', () => {
    expect(() => createMatch({ difficulty: 5 })).toThrow(RangeError);
  });
});

describe('kickOff', () => {
  it('ボールをセンターへ戻しホールドオフを解除する', () => {
    const m = createMatch();
    const b = m.ball;
    b.x = 100;
    b.vx = 4;
    b.state = { kind: 'owned', owner: m.teams[0].activeControlPlayer };
    player(m.players, 3).timer = 60;
    m.accumulator = 0.01;
    kickOff(m);
    expect(m.ball).toBe(b);
    expect(m.ball).toEqual(createBall());
    expect(m.players.every((p) => p.timer === 0)).toBe(true);
    expect(m.accumulator).toBe(0);
  });
});
