import type {
  Address,
  Assets,
  OutRef,
  Redeemer,
  UTxO,
} from "@lucid-evolution/lucid";
import type { ActionRequest } from "../action-request.js";
import type { PubKeyHash } from "../common.js";
import type { OracleDeployment, StateUnits } from "../deployment.js";
import type {
  EncodedOracleModel,
  OracleSnapshot,
  OracleState,
} from "../oracle-state.js";
import type { TransitionPlan } from "../state-machine.js";
import type { Transaction, TxOutput } from "../transaction.js";

/**
 * The party building a transaction. Wallet inputs, collateral and change all
 * come from and go back to `address`.
 */
export type Caller = {
  readonly pubKeyHash: PubKeyHash;
  readonly address: Address;
};

export type BuildOptions = {
  /** Width of the validity interval, starting at the snapshot time. */
  readonly txValidityMs: number;
  /** Balancing rounds before giving up on a stable fee. */
  readonly maxFeeIterations?: number;
};

export type ScriptInput = {
  readonly utxo: UTxO;
  readonly redeemer: Redeemer;
};

/**
 * What an action contributes to a transaction before wallet inputs, change,
 * collateral and fee are added.
 */
export type TxSkeleton = {
  readonly scriptInputs: readonly ScriptInput[];
  readonly referenceInputs: readonly UTxO[];
  readonly outputs: readonly TxOutput[];
  readonly mint: Assets;
};

export type SkeletonContext = {
  readonly deployment: OracleDeployment;
  readonly units: StateUnits;
  readonly state: OracleState;
  readonly snapshot: OracleSnapshot;
  readonly plan: TransitionPlan;
  readonly caller: Caller;
  /** Datums of the state after the transition. */
  readonly next: EncodedOracleModel;
};

export type BuildResult = {
  readonly request: ActionRequest;
  readonly tx: Transaction;
  readonly txHash: string;
  readonly requiredSigners: readonly PubKeyHash[];
  readonly nextState: OracleState;
  /** Every UTxO the transaction consumes, wallet inputs included. */
  readonly spent: readonly OutRef[];
};
