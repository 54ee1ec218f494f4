export * from './constants.ts';
export { player, spawnPlayer, tickPlayerTimers } from './pools.ts';
export { ballOwner, collides, createBall, DISPOSSESS_SPEED, resetBall, updateBall } from './simulation/ball.ts';
export {
  approach,
  axisStep,
  boundsX,
  boundsY,
  GOAL_BOUNDS_X,
  GOAL_BOUNDS_Y,
  onPitch,
  PITCH_BOUNDS_X,
  PITCH_BOUNDS_Y,
  stepsToTravel,
} from './simulation/ball-physics.ts';
export type { PositionCost } from './simulation/kick.ts';
export { attackCost, KICKER_HOLDOFF, kickBall, wantsToKick } from './simulation/kick.ts';
export type { MatchOptions } from './simulation/match.ts';
export { createMatch, DIFFICULTIES, difficulty, kickOff } from './simulation/match.ts';
export type { PassTarget } from './simulation/targeting.ts';
export {
  findPassTarget,
  GOAL_TARGETS,
  goalTarget,
  isTargetable,
  PASS_CONE_COS,
  PASS_RANGE,
  targetPoint,
} from './simulation/targeting.ts';
export type { TeamControls, TickInput } from './simulation/update.ts';
export { MAX_STEPS_PER_FRAME, stepOnce, update } from './simulation/update.ts';
export type {
  Ball,
  BallState,
  Bounds,
  Difficulty,
  MatchState,
  Player,
  PlayerIndex,
  Team,
  TargetPoint,
  TeamState,
  Vec2,
} from './types.ts';
export { NO_PLAYER, opposingTeam, TEAMS } from './types.ts';
export type { Normalized } from './vec.ts';
export { angleToVector, dist, dot, safeNormalize } from './vec.ts';
