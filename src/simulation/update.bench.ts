import { bench, describe } from 'vitest';
import { giveBall, NO_INPUT } from '../__test__/match-helper.ts';
import { createMatch } from './match.ts';
import { findPassTarget, isTargetable } from './targeting.ts';
import { stepOnce } from './update.ts';

describe('stepOnce 1tick', () => {
  bench('キックオフ直後（フリーボール、14 人）', () => {
    const m = createMatch({ humanTeams: [false, false] });
    stepOnce(m, NO_INPUT);
  });

  bench('ドリブル中（所有者あり、パス判定込み）', () => {
    const m = createMatch({ humanTeams: [false, false] });
    const o = m.teams[0].activeControlPlayer;
    giveBall(m, o);
    m.ball.timer = 1000;
    stepOnce(m, NO_INPUT);
  });
});

describe('targeting', () => {
  const m = createMatch({ humanTeams: [false, false] });
  const o = m.teams[0].activeControlPlayer;

  bench('findPassTarget', () => {
    findPassTarget(m, o);
  });

  bench('isTargetable × 14', () => {
    const src = m.players[o];
    if (src === undefined) throw new RangeError(`Invalid player index: ${o}`);
    for (const p of m.players) isTargetable(p, src, m.players, false);
  });
});
