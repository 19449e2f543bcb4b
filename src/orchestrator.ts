export { runShard, type RunShardOptions } from "./orchestrator/runShard.js";
export { runCombine, type CombineSummary } from "./merge/combiner.js";
export { runApply, type ApplySummary } from "./merge/applier.js";
