export * from "./errors.js";
export * from "./common.js";
export * from "./constants.js";
export * from "./network.js";
export * from "./datums.js";
export * from "./redeemers.js";
export * from "./action-request.js";
export * from "./oracle-state.js";
export * from "./consensus.js";
export * from "./state-machine.js";
export * from "./deployment.js";
export * from "./chain-query.js";
export * from "./coin-selection.js";
export * from "./transaction.js";
export * from "./envelope.js";
export * from "./session-store.js";
export * from "./signature-coordinator.js";
export * from "./tx-validation.js";
export * from "./submission-gate.js";
export * from "./config.js";
export * as TxBuilder from "./tx-builder/index.js";
