export { DepositQueue, type DepositQueueOptions } from "./deposit-queue.js";
export { MatchingEngine, type MatchingEngineOptions } from "./matching-engine.js";
export type { ChunkAssignment, DepositReader, DepositRecord, ReleaseReason } from "./types.js";
