import { Effect } from "effect";
import { Chain } from "../services/chain.js";
import { Gate } from "../services/submitter.js";
import { chalk, coordinator } from "./common.js";

export const submitCommand = (id: string, flags: { readonly wait?: boolean }) =>
  Effect.gen(function* () {
    const { query } = yield* Chain;
    const gate = yield* Gate;
    const sessions = yield* coordinator;
    const txHash = yield* gate.submitSession(sessions, query, id);
    console.log(`${chalk.green("submitted")} ${txHash}`);
    if (flags.wait === true) {
      yield* gate.awaitConfirmation(txHash);
      console.log(`${chalk.green("confirmed")} ${txHash}`);
    }
    return txHash;
  });
