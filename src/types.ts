export interface Vec2 {
  x: number;
  y: number;
}

export interface Player {
  team: Team;
  x: number;
  y: number;
  /** 向き（rad）。0 = +X、y-down 画面で反時計回り */
  dir: number;
  /** ボール再取得までの残りフレーム。負のときのみ取得可能 */
  timer: number;
}

/** パス先候補。Player はそのまま満たし、ゴールは攻撃側チームのラベル付き座標 */
export interface TargetPoint {
  readonly x: number;
  readonly y: number;
  readonly team: Team;
}

export type BallState = { readonly kind: 'free' } | { readonly kind: 'owned'; readonly owner: PlayerIndex };

export interface Ball {
  x: number;
  y: number;
  vx: number;
  vy: number;
  /** 所有者変更後のホールドオフ。CPU のパス頻度を制限する */
  timer: number;
  state: BallState;
  /** 描画用の影。物理は持たず毎フレーム位置だけ追従する */
  shadow: Vec2;
}

export interface Bounds {
  readonly min: number;
  readonly max: number;
}

export interface TeamState {
  human: boolean;
  activeControlPlayer: PlayerIndex;
}

export interface Difficulty {
  name: string;
  /** ボール取得時に ball.timer へ入るフレーム数 */
  holdoff: number;
}

export interface MatchState {
  players: Player[];
  teams: [TeamState, TeamState];
  ball: Ball;
  difficulty: Difficulty;
  /** 固定タイムステップの未消化時間（秒） */
  accumulator: number;
  frame: number;
}

export type Team = 0 | 1;
export const TEAMS: readonly [Team, Team] = [0, 1];

/** プールインデックスの branded type（素の number との混用を防止） */
export type PlayerIndex = number & { readonly __brand: 'PlayerIndex' };

/** 選手なしを示すセンチネル値 */
export const NO_PLAYER = -1 as PlayerIndex;

export const FREE: BallState = { kind: 'free' };

export function opposingTeam(team: Team): Team {
  return team === 0 ? 1 : 0;
}
