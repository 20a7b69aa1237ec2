import {
  CML,
  coreToTxOutput,
  createCostModels,
  fromHex,
  fromUnit,
  toHex,
  toUnit,
  utxoToCore,
} from "@lucid-evolution/lucid";
import type {
  Address,
  Assets,
  CostModels,
  Datum,
  OutRef,
  Redeemer,
  Script,
  UTxO,
} from "@lucid-evolution/lucid";
import { Effect } from "effect";
import { encodeCbor } from "./cbor.js";
import {
  addAssets,
  blake2b224,
  subtractAssets,
  sumUTxOAssets,
} from "./common.js";
import type { PubKeyHash } from "./common.js";
import { MIN_UTXO_OVERHEAD_BYTES } from "./constants.js";
import { CborDeserializationError } from "./errors.js";

export type TxOutput = {
  readonly address: Address;
  readonly assets: Assets;
  /** Inline datum. */
  readonly datum: Datum | null;
  readonly scriptRef: Script | null;
};

export type RedeemerTag = "spend" | "mint";

export type ExUnits = {
  readonly mem: number;
  readonly steps: number;
};

export type TxRedeemer = {
  readonly tag: RedeemerTag;
  /** Position of the spent input, or of the policy id, in ledger order. */
  readonly index: number;
  readonly data: Redeemer;
  readonly exUnits: ExUnits;
};

export type TransactionBody = {
  readonly inputs: readonly OutRef[];
  readonly referenceInputs: readonly OutRef[];
  readonly collateral: readonly OutRef[];
  readonly outputs: readonly TxOutput[];
  readonly fee: bigint;
  readonly mint: Assets;
  readonly redeemers: readonly TxRedeemer[];
  readonly requiredSigners: readonly PubKeyHash[];
  /** Validity interval bounds, in slots. */
  readonly validFrom: number | null;
  readonly validTo: number | null;
  /** Scripts carried in the witness set. */
  readonly scripts: readonly Script[];
  readonly scriptDataHash: string | null;
};

export type VKeyWitness = {
  readonly vkey: string;
  readonly signature: string;
};

export type Transaction = {
  readonly body: TransactionBody;
  readonly witnesses: readonly VKeyWitness[];
};

// ============================================================================
// Encoding
// ============================================================================

const REDEEMER_TAGS: Record<RedeemerTag, CML.RedeemerTag> = {
  spend: CML.RedeemerTag.Spend,
  mint: CML.RedeemerTag.Mint,
};

const LANGUAGES: Record<Exclude<Script["type"], "Native">, CML.Language> = {
  PlutusV1: CML.Language.PlutusV1,
  PlutusV2: CML.Language.PlutusV2,
  PlutusV3: CML.Language.PlutusV3,
};

// Largest coin value the ledger accepts. Used as a size placeholder when an
// output's own lovelace is not yet known.
const MAX_COIN = 0xffff_ffff_ffff_ffffn;

// Outputs are built through Lucid's UTxO conversion, which needs an out-ref
// that never reaches the encoded output.
const UNUSED_OUT_REF: OutRef = { txHash: "00".repeat(32), outputIndex: 0 };

type CmlList<T> = {
  len(): number;
  get(index: number): T;
};

const listItems = <T>(list: CmlList<T> | undefined): T[] => {
  const items: T[] = [];
  if (list === undefined) {
    return items;
  }
  for (let i = 0; i < list.len(); i++) {
    items.push(list.get(i));
  }
  return items;
};

const toCmlInputs = (refs: readonly OutRef[]): CML.TransactionInputList => {
  const list = CML.TransactionInputList.new();
  for (const ref of refs) {
    list.add(
      CML.TransactionInput.new(
        CML.TransactionHash.from_hex(ref.txHash),
        BigInt(ref.outputIndex),
      ),
    );
  }
  return list;
};

const toCmlOutput = (output: TxOutput): CML.TransactionOutput =>
  utxoToCore({ ...UNUSED_OUT_REF, ...output }).output();

const toCmlMint = (assets: Assets): CML.Mint => {
  const byPolicy = new Map<string, CML.MapAssetNameToNonZeroInt64>();
  for (const unit of Object.keys(assets).sort()) {
    const qty = assets[unit];
    if (unit === "lovelace" || qty === undefined || qty === 0n) continue;
    const { policyId, assetName } = fromUnit(unit);
    const names =
      byPolicy.get(policyId) ?? CML.MapAssetNameToNonZeroInt64.new();
    names.insert(CML.AssetName.from_raw_bytes(fromHex(assetName ?? "")), qty);
    byPolicy.set(policyId, names);
  }
  const mint = CML.Mint.new();
  for (const [policyId, names] of byPolicy) {
    mint.insert_assets(CML.ScriptHash.from_hex(policyId), names);
  }
  return mint;
};

const toCmlRedeemers = (
  redeemers: readonly TxRedeemer[],
): CML.Redeemers => {
  const list = CML.LegacyRedeemerList.new();
  for (const r of redeemers) {
    list.add(
      CML.LegacyRedeemer.new(
        REDEEMER_TAGS[r.tag],
        BigInt(r.index),
        CML.PlutusData.from_cbor_hex(r.data),
        CML.ExUnits.new(BigInt(r.exUnits.mem), BigInt(r.exUnits.steps)),
      ),
    );
  }
  return CML.Redeemers.new_arr_legacy_redeemer(list);
};

const toCmlWitness = (witness: VKeyWitness): CML.Vkeywitness =>
  CML.Vkeywitness.from_cbor_bytes(
    encodeCbor([fromHex(witness.vkey), fromHex(witness.signature)]),
  );

const toCmlBody = (body: TransactionBody): CML.TransactionBody => {
  const outputs = CML.TransactionOutputList.new();
  for (const output of body.outputs) {
    outputs.add(toCmlOutput(output));
  }
  const cmlBody = CML.TransactionBody.new(
    toCmlInputs(body.inputs),
    outputs,
    body.fee,
  );
  if (body.validTo !== null) cmlBody.set_ttl(BigInt(body.validTo));
  if (body.validFrom !== null) {
    cmlBody.set_validity_interval_start(BigInt(body.validFrom));
  }
  const mint = toCmlMint(body.mint);
  if (mint.policy_count() > 0) cmlBody.set_mint(mint);
  if (body.scriptDataHash !== null) {
    cmlBody.set_script_data_hash(
      CML.ScriptDataHash.from_hex(body.scriptDataHash),
    );
  }
  if (body.collateral.length > 0) {
    cmlBody.set_collateral_inputs(toCmlInputs(body.collateral));
  }
  if (body.requiredSigners.length > 0) {
    const signers = CML.Ed25519KeyHashList.new();
    for (const pkh of body.requiredSigners) {
      signers.add(CML.Ed25519KeyHash.from_hex(pkh));
    }
    cmlBody.set_required_signers(signers);
  }
  if (body.referenceInputs.length > 0) {
    cmlBody.set_reference_inputs(toCmlInputs(body.referenceInputs));
  }
  return cmlBody;
};

const scriptsOfType = (
  scripts: readonly Script[],
  type: Script["type"],
): string[] => scripts.filter((s) => s.type === type).map((s) => s.script);

const toCmlWitnessSet = (
  body: TransactionBody,
  witnesses: readonly VKeyWitness[],
): CML.TransactionWitnessSet => {
  const set = CML.TransactionWitnessSet.new();
  if (witnesses.length > 0) {
    const vkeys = CML.VkeywitnessList.new();
    for (const witness of witnesses) vkeys.add(toCmlWitness(witness));
    set.set_vkeywitnesses(vkeys);
  }
  const native = scriptsOfType(body.scripts, "Native");
  if (native.length > 0) {
    const list = CML.NativeScriptList.new();
    for (const s of native) list.add(CML.NativeScript.from_cbor_hex(s));
    set.set_native_scripts(list);
  }
  const v1 = scriptsOfType(body.scripts, "PlutusV1");
  if (v1.length > 0) {
    const list = CML.PlutusV1ScriptList.new();
    for (const s of v1) list.add(CML.PlutusV1Script.from_cbor_hex(s));
    set.set_plutus_v1_scripts(list);
  }
  const v2 = scriptsOfType(body.scripts, "PlutusV2");
  if (v2.length > 0) {
    const list = CML.PlutusV2ScriptList.new();
    for (const s of v2) list.add(CML.PlutusV2Script.from_cbor_hex(s));
    set.set_plutus_v2_scripts(list);
  }
  const v3 = scriptsOfType(body.scripts, "PlutusV3");
  if (v3.length > 0) {
    const list = CML.PlutusV3ScriptList.new();
    for (const s of v3) list.add(CML.PlutusV3Script.from_cbor_hex(s));
    set.set_plutus_v3_scripts(list);
  }
  if (body.redeemers.length > 0) {
    set.set_redeemers(toCmlRedeemers(body.redeemers));
  }
  return set;
};

export const toCmlTransaction = (tx: Transaction): CML.Transaction =>
  CML.Transaction.new(
    toCmlBody(tx.body),
    toCmlWitnessSet(tx.body, tx.witnesses),
    true,
    undefined,
  );

export const encodeTransaction = (tx: Transaction): Uint8Array =>
  toCmlTransaction(tx).to_cbor_bytes();

export const transactionToHex = (tx: Transaction): string =>
  toHex(encodeTransaction(tx));

/**
 * Transaction id: blake2b-256 of the encoded body. Witnesses do not affect it.
 */
export const transactionHash = (body: TransactionBody): string =>
  CML.hash_transaction(toCmlBody(body)).to_hex();

/**
 * Script integrity hash over the redeemers and the cost models of the
 * languages the transaction runs. Null when no script runs.
 */
export const scriptDataHash = (
  redeemers: readonly TxRedeemer[],
  languages: readonly Script["type"][],
  costModels: CostModels,
): string | null => {
  if (redeemers.length === 0) {
    return null;
  }
  const used = CML.LanguageList.new();
  for (const type of new Set(languages)) {
    if (type !== "Native") used.add(LANGUAGES[type]);
  }
  const hash = CML.calc_script_data_hash(
    toCmlRedeemers(redeemers),
    CML.PlutusDataList.new(),
    createCostModels(costModels),
    used,
  );
  return hash === undefined ? null : hash.to_hex();
};

// ============================================================================
// Decoding
// ============================================================================

const fromCmlInputs = (
  list: CML.TransactionInputList | undefined,
): OutRef[] =>
  listItems(list).map((input) => ({
    txHash: input.transaction_id().to_hex(),
    outputIndex: Number(input.index()),
  }));

const fromCmlOutput = (
  output: CML.TransactionOutput,
  index: number,
): TxOutput => {
  const { address, assets, datum, datumHash, scriptRef } =
    coreToTxOutput(output);
  if (datumHash) {
    throw new CborDeserializationError({
      message: `outputs[${index}] carries a datum hash instead of an inline datum`,
      cause: datumHash,
    });
  }
  return {
    address,
    assets,
    datum: datum ?? null,
    scriptRef: scriptRef ?? null,
  };
};

const fromCmlMint = (mint: CML.Mint | undefined): Assets => {
  const assets: Assets = {};
  if (mint === undefined) {
    return assets;
  }
  for (const policy of listItems(mint.keys())) {
    const names = mint.get_assets(policy);
    for (const name of listItems(names?.keys())) {
      const qty = names?.get(name);
      if (qty !== undefined) {
        assets[toUnit(policy.to_hex(), toHex(name.to_raw_bytes()))] = qty;
      }
    }
  }
  return assets;
};

const fromCmlRedeemers = (
  redeemers: CML.Redeemers | undefined,
): TxRedeemer[] => {
  if (redeemers === undefined) {
    return [];
  }
  const legacy = redeemers.as_arr_legacy_redeemer();
  if (legacy === undefined) {
    throw new CborDeserializationError({
      message: "Redeemers must be encoded as an array",
      cause: null,
    });
  }
  return listItems(legacy).map((r, i) => {
    const tag = r.tag();
    const redeemerTag: RedeemerTag | null =
      tag === CML.RedeemerTag.Spend
        ? "spend"
        : tag === CML.RedeemerTag.Mint
          ? "mint"
          : null;
    if (redeemerTag === null) {
      throw new CborDeserializationError({
        message: `redeemers[${i}] has an unsupported redeemer tag`,
        cause: tag,
      });
    }
    const exUnits = r.ex_units();
    return {
      tag: redeemerTag,
      index: Number(r.index()),
      data: r.data().to_cbor_hex(),
      exUnits: { mem: Number(exUnits.mem()), steps: Number(exUnits.steps()) },
    };
  });
};

const fromCmlScripts = (set: CML.TransactionWitnessSet): Script[] => [
  ...listItems(set.native_scripts()).map(
    (s): Script => ({ type: "Native", script: s.to_cbor_hex() }),
  ),
  ...listItems(set.plutus_v1_scripts()).map(
    (s): Script => ({ type: "PlutusV1", script: s.to_cbor_hex() }),
  ),
  ...listItems(set.plutus_v2_scripts()).map(
    (s): Script => ({ type: "PlutusV2", script: s.to_cbor_hex() }),
  ),
  ...listItems(set.plutus_v3_scripts()).map(
    (s): Script => ({ type: "PlutusV3", script: s.to_cbor_hex() }),
  ),
];

const fromCmlTransaction = (tx: CML.Transaction): Transaction => {
  if (!tx.is_valid()) {
    throw new CborDeserializationError({
      message: "Transactions flagged as invalid are not supported",
      cause: null,
    });
  }
  const body = tx.body();
  const set = tx.witness_set();
  const validFrom = body.validity_interval_start();
  const validTo = body.ttl();
  const dataHash = body.script_data_hash();
  return {
    body: {
      inputs: fromCmlInputs(body.inputs()),
      referenceInputs: fromCmlInputs(body.reference_inputs()),
      collateral: fromCmlInputs(body.collateral_inputs()),
      outputs: listItems(body.outputs()).map(fromCmlOutput),
      fee: body.fee(),
      mint: fromCmlMint(body.mint()),
      redeemers: fromCmlRedeemers(set.redeemers()),
      requiredSigners: listItems(body.required_signers()).map((h) =>
        h.to_hex(),
      ),
      validFrom: validFrom === undefined ? null : Number(validFrom),
      validTo: validTo === undefined ? null : Number(validTo),
      scripts: fromCmlScripts(set),
      scriptDataHash: dataHash === undefined ? null : dataHash.to_hex(),
    },
    witnesses: listItems(set.vkeywitnesses()).map((w) => ({
      vkey: toHex(w.vkey().to_raw_bytes()),
      signature: toHex(w.ed25519_signature().to_raw_bytes()),
    })),
  };
};

const decodeTransactionUnsafe = (bytes: Uint8Array): Transaction => {
  const tx = fromCmlTransaction(CML.Transaction.from_cbor_bytes(bytes));
  // Fields the model does not carry would be lost here, and the hash we
  // compute would no longer be the one signers commit to.
  if (toHex(encodeTransaction(tx)) !== toHex(bytes)) {
    throw new CborDeserializationError({
      message: "Transaction is not in canonical form",
      cause: null,
    });
  }
  return tx;
};

export const decodeTransaction = (
  bytes: Uint8Array,
): Effect.Effect<Transaction, CborDeserializationError> =>
  Effect.try({
    try: () => decodeTransactionUnsafe(bytes),
    catch: (e) =>
      e instanceof CborDeserializationError
        ? e
        : new CborDeserializationError({
            message: "Failed to decode transaction",
            cause: e,
          }),
  });

export const decodeTransactionHex = (
  cborHex: string,
): Effect.Effect<Transaction, CborDeserializationError> =>
  Effect.suspend(() => decodeTransaction(fromHex(cborHex)));

// ============================================================================
// Size, fees and balance
// ============================================================================

export type FeeParameters = {
  readonly minFeeA: bigint;
  readonly minFeeB: bigint;
  readonly priceMem: number;
  readonly priceStep: number;
};

let sizingWitness: VKeyWitness | null = null;

// Every key witness encodes to the same length, so any real one sizes them.
const witnessForSizing = (): VKeyWitness => {
  sizingWitness ??= makeWitness("00".repeat(32), CML.PrivateKey.generate_ed25519());
  return sizingWitness;
};

/**
 * Serialized size of the transaction once `witnessCount` key witnesses are
 * attached.
 */
export const estimateSize = (
  body: TransactionBody,
  witnessCount: number,
): number =>
  encodeTransaction({
    body,
    witnesses: Array.from({ length: witnessCount }, witnessForSizing),
  }).length;

export const scriptExecutionFee = (
  redeemers: readonly TxRedeemer[],
  params: FeeParameters,
): bigint =>
  redeemers.reduce(
    (acc, r) =>
      acc +
      BigInt(
        Math.ceil(params.priceMem * r.exUnits.mem + params.priceStep * r.exUnits.steps),
      ),
    0n,
  );

export const minimumFee = (
  body: TransactionBody,
  witnessCount: number,
  params: FeeParameters,
): { fee: bigint; size: number } => {
  const size = estimateSize(body, witnessCount);
  return {
    fee:
      params.minFeeA * BigInt(size) +
      params.minFeeB +
      scriptExecutionFee(body.redeemers, params),
    size,
  };
};

/**
 * Minimum lovelace an output must carry: `(160 + size) * coinsPerUtxoByte`,
 * with the output measured at the largest coin value so the result does not
 * depend on the lovelace it will end up holding.
 */
export const minUtxoLovelace = (
  output: TxOutput,
  coinsPerUtxoByte: bigint,
): bigint => {
  const sized = toCmlOutput({
    ...output,
    assets: { ...output.assets, lovelace: MAX_COIN },
  }).to_cbor_bytes().length;
  return (MIN_UTXO_OVERHEAD_BYTES + BigInt(sized)) * coinsPerUtxoByte;
};

/**
 * Value left over once outputs and fee are paid: inputs plus mint minus
 * outputs minus fee. A balanced transaction leaves nothing.
 */
export const transactionImbalance = (
  body: TransactionBody,
  spent: readonly UTxO[],
): Assets =>
  subtractAssets(
    addAssets(sumUTxOAssets(spent), body.mint),
    addAssets(
      ...body.outputs.map((o) => o.assets),
      { lovelace: body.fee },
    ),
  );

// ============================================================================
// Key witnesses
// ============================================================================

export const witnessKeyHash = (witness: VKeyWitness): PubKeyHash =>
  toHex(blake2b224(fromHex(witness.vkey)));

/**
 * Checks an ed25519 signature over the transaction hash.
 */
export const verifyWitness = (txHash: string, witness: VKeyWitness): boolean => {
  try {
    const cmlWitness = toCmlWitness(witness);
    return cmlWitness
      .vkey()
      .verify(fromHex(txHash), cmlWitness.ed25519_signature());
  } catch {
    return false;
  }
};

export const makeWitness = (
  txHash: string,
  privateKey: InstanceType<typeof CML.PrivateKey>,
): VKeyWitness => {
  const witness = CML.make_vkey_witness(
    CML.TransactionHash.from_raw_bytes(fromHex(txHash)),
    privateKey,
  );
  return {
    vkey: toHex(witness.vkey().to_raw_bytes()),
    signature: toHex(witness.ed25519_signature().to_raw_bytes()),
  };
};
