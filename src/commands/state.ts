import { Effect } from "effect";
import { outRefKey } from "../common.js";
import { COIN_PRECISION } from "../constants.js";
import { requiredNodeCount } from "../oracle-state.js";
import type { OracleState } from "../oracle-state.js";
import { isFreshFeed } from "../state-machine.js";
import { Chain } from "../services/chain.js";
import { chalk } from "./common.js";

export const describeState = (state: OracleState): string[] => {
  const { model } = state;
  const now = BigInt(state.snapshot?.observedAt ?? 0);
  const lines = [
    `${chalk.bold("lifecycle")}  ${state.lifecycle}`,
    `${chalk.bold("reserve")}    ${state.reserve}`,
    `${chalk.bold("fee rate")}   ${
      state.feeRate === null ? "as configured" : `${state.feeRate} per ${COIN_PRECISION}`
    }`,
    `${chalk.bold("price")}      ${
      model.price === null
        ? "none"
        : `${model.price.price} (set ${model.price.timestamp}, expires ${model.price.expiry})`
    }`,
    `${chalk.bold("platform")}   reward ${model.platformReward}, threshold ${model.settings.platform.multisigThreshold} of ${model.settings.platform.multisigPkhs.length}`,
    `${chalk.bold("nodes")}      ${model.nodes.length} (aggregation needs ${requiredNodeCount(model.settings)} fresh)`,
  ];
  for (const node of model.nodes) {
    const feed =
      node.feed === null
        ? chalk.gray("no feed")
        : `${node.feed.value} at ${node.feed.lastUpdate}${
            isFreshFeed(node, model, now) ? "" : chalk.yellow(" (stale)")
          }`;
    lines.push(`  ${node.operator}  ${feed}  reward ${node.reward}`);
  }
  if (state.snapshot !== null) {
    lines.push(`${chalk.bold("aggState")}   ${outRefKey(state.snapshot.aggState)}`);
    lines.push(
      `${chalk.bold("refScript")}  ${
        state.snapshot.referenceScript === null
          ? "none"
          : outRefKey(state.snapshot.referenceScript)
      }`,
    );
  }
  return lines;
};

export const stateCommand = Effect.gen(function* () {
  const { query } = yield* Chain;
  const state = yield* query.resolveState();
  for (const line of describeState(state)) {
    console.log(line);
  }
  return state;
});
