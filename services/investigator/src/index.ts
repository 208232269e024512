/**
 * @salesiq/investigator
 * Anomaly investigation over campaign performance data
 */

export * from "./systems/investigation/index.js";
export * from "./shared/index.js";
