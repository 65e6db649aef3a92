// Public engine surface

// Configuration
export { makeConfig, validateConfig, DEFAULT_PHYSICS, DEFAULT_RULES } from "./config";
export type { MatchConfig, MatchConfigOverrides, PhysicsConfig, RulesConfig } from "./config";

// Match facade
export { createMatch, positionStriker, advanceTick } from "./match";
export type { Match, CreateMatchOptions } from "./match";
export { tryBeginShot } from "./tryApply";

// Rules
export { validateShot, beginShot, resolveShot } from "./ruleEngine";
export type { ShotCommand, WorldIntent, BoardReport, Resolution } from "./ruleEngine";
export { colorForPlayer, nextPlayer, winnerForColor } from "./sides";

// Board
export { openingLayout, strikerBaseline, baselinePoint } from "./layout";
export type { DiscSeed, Baseline } from "./layout";
export { STRIKER_ID, remainingCoins, findDisc } from "./physicsWorld";

// Snapshots, serialization and hashing
export { SNAPSHOT_FORMAT_VERSION } from "./snapshotFormat";
export type { MatchSnapshot, DiscSnapshot } from "./snapshotFormat";
export { snapshotMatch, restoreMatch, tryRestore } from "./snapshot";
export { validateSnapshot } from "./validateSnapshot";
export { serializeSnapshot, deserializeSnapshot } from "./serialization";
export { hashMatch, hashSnapshot } from "./stateHash";

// Sync primitive
export { playShot, playShotWithSync } from "./sync";
export type { PlayedShot, SyncResult } from "./sync";

// Replay log, file format and IO
export type { ReplayEntry, ReplayLog } from "./replay";
export { recordShot } from "./replayRecorder";
export { applyAndRecord } from "./replayApply";
export { REPLAY_FORMAT_VERSION } from "./replayFormat";
export type { ReplayFile, ReplayFileV1 } from "./replayFormat";
export { serializeReplay, deserializeReplay } from "./replayIO";
export { validateReplayFile, verifyReplay } from "./replayValidate";
export type { ReplayVerification } from "./replayValidate";

// Envelopes
export type {
  EngineError,
  EngineErrorCode,
  ShotResponse,
  PlaceResponse,
  RestoreResponse,
  TurnContext,
} from "./serverEnvelope";
