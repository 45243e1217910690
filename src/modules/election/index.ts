export { ElectionModule } from "./election.module";
export { ElectionService } from "./election.service";
export { ElectionEngine, ElectionEngineOptions, ExecuteOptions } from "./election.engine";
export * from "./election.types";
export * from "./election.errors";
export * from "./election-dataset";
export * from "./election-config";
export * from "./election-overrides";
export * from "./election-result.assembler";
export * from "./election.codec";
export { ELECTION_ALGORITHMS, multiPhase } from "./algorithms";
export { sequentialPhragmen } from "./algorithms/sequential-phragmen";
export { phragmms } from "./algorithms/phragmms";
