// Public engine surface

// Scorer
export {
  evaluate,
  take,
  takeAll,
  isBlown,
  rawScore,
  countFaces,
  groupValue,
  isAvailable,
  triple,
  SINGLE_ONE,
  SINGLE_FIVE,
} from "./scorer";
export type { TakeResult, RawScore } from "./scorer";

// Errors (engine-internal faults)
export { InvalidTakeError, StrategyContractError, StateInvariantError } from "./errors";

// Rules + configuration
export {
  DEFAULT_RULES,
  resolveRules,
  rulesFromEnv,
  WIN_BONUS,
  BUST_PENALTY,
  ILLEGAL_MOVE_PENALTY,
  ACTION_BANK,
  ACTION_ROLL,
  ACTION_TAKE_FIVE,
  ACTION_TAKE_ONE,
} from "./rulesConstants";
export type { RulesConfig } from "./rulesConstants";

// Randomness
export { makeSeededRng, rollDice, randomSeed } from "./rng";
export type { Rng } from "./rng";

// Turn + game state machines
export { startTurn, applyRoll, applyTake, decideRoll, playTurn } from "./turn";
export type { RollDecision, TurnContext, PlayTurnOptions } from "./turn";
export { makeGameState } from "./makeState";
export { applyTurnResult, playGame, currentPlayer } from "./game";
export type { GameResult, PlayGameOptions, TurnRecord } from "./game";

// Decision surface
export { actionForGroup, groupForAction, describeAction } from "./actions";
export { legalActions, actionMask } from "./legalActions";
export { encodeCompact, encodeExtended, scoreBucket } from "./observation";
export type { ObservationEncoding } from "./observation";
export { createEnv, resetEnv, stepEnv, observe, envLegalActions } from "./env";
export type { EnvOptions, EnvSession } from "./env";
export type { StepResponse, StepOk, StepErr, StepInfo, EnvError, EnvErrorCode } from "./envEnvelope";
