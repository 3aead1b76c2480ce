/**
 * Address handlers
 *
 * validate_address asks the node; balances, history and UTXOs come from
 * mempool.space since Bitcoin Core does not index arbitrary addresses.
 * Amounts are in satoshis as mempool.space reports them.
 */

import { z } from 'zod';
import type { JsonRpcParams } from '@btc-gateway/types';
import type { HandlerBinding, HandlerContext } from '../dispatcher/types';
import { classifyAddress, decodeAddress } from '../validation/bitcoin-validators';
import { AddressParam, boundedInt, parseParams } from './params';
import {
  AddressStatsSchema,
  AddressTransaction,
  AddressTransactionsSchema,
  UtxoListSchema,
  fetchUpstream,
  joinUrl,
} from './upstream';

export const MAX_TRANSACTIONS_LIMIT = 50;

/** Transactions inspected by analyze_address_activity */
const ANALYSIS_WINDOW = 50;
const RECENT_ACTIVITY_SIZE = 10;

const AddressParams = z.object({ address: AddressParam });

const AddressTransactionsParams = z.object({
  address: AddressParam,
  limit: boundedInt(1, MAX_TRANSACTIONS_LIMIT, 'limit').default(25),
});

export interface ValueFlow {
  input: number;
  output: number;
  net: number;
}

export interface AddressTransactionSummary {
  txid: string;
  block_height: number | null;
  block_hash: string | null;
  block_time: number | null;
  confirmed: boolean;
  fee: number | null;
  value: ValueFlow;
  size: number | null;
  weight: number | null;
}

export interface AddressBalance {
  address: string;
  balance: { confirmed: number; unconfirmed: number; total: number };
  transaction_count: { confirmed: number; unconfirmed: number; total: number };
  address_type: string;
}

export interface AddressTransactions {
  address: string;
  total_transactions: number;
  returned_transactions: number;
  transactions: AddressTransactionSummary[];
}

export interface UtxoSummary {
  txid: string;
  vout: number;
  value: number;
  confirmed: boolean;
  block_height: number | null;
  block_hash: string | null;
  block_time: number | null;
}

export interface AddressUtxos {
  address: string;
  utxo_count: number;
  total_value: number;
  utxos: UtxoSummary[];
}

function addressUrl(ctx: HandlerContext, address: string, suffix = ''): string {
  return joinUrl(ctx.config.apis.mempoolSpaceUrl, `address/${encodeURIComponent(address)}${suffix}`);
}

/**
 * Satoshis the address spent (inputs) and received (outputs) in one
 * transaction.
 */
export function valueFlow(tx: AddressTransaction, address: string): ValueFlow {
  let input = 0;
  for (const vin of tx.vin) {
    if (vin.prevout?.scriptpubkey_address === address) {
      input += vin.prevout.value;
    }
  }
  let output = 0;
  for (const vout of tx.vout) {
    if (vout.scriptpubkey_address === address) {
      output += vout.value;
    }
  }
  return { input, output, net: output - input };
}

function summarizeTransaction(tx: AddressTransaction, address: string): AddressTransactionSummary {
  return {
    txid: tx.txid,
    block_height: tx.status.block_height ?? null,
    block_hash: tx.status.block_hash ?? null,
    block_time: tx.status.block_time ?? null,
    confirmed: tx.status.confirmed,
    fee: tx.fee ?? null,
    value: valueFlow(tx, address),
    size: tx.size ?? null,
    weight: tx.weight ?? null,
  };
}

async function fetchBalance(ctx: HandlerContext, address: string): Promise<AddressBalance> {
  const stats = await fetchUpstream(ctx, AddressStatsSchema, addressUrl(ctx, address));
  const chain = stats.chain_stats;
  const mempool = stats.mempool_stats;
  const confirmed = chain.funded_txo_sum - chain.spent_txo_sum;
  const unconfirmed = mempool.funded_txo_sum - mempool.spent_txo_sum;

  return {
    address,
    balance: { confirmed, unconfirmed, total: confirmed + unconfirmed },
    transaction_count: {
      confirmed: chain.tx_count,
      unconfirmed: mempool.tx_count,
      total: chain.tx_count + mempool.tx_count,
    },
    address_type: classifyAddress(address),
  };
}

async function fetchTransactions(ctx: HandlerContext, address: string, limit: number): Promise<AddressTransactions> {
  const transactions = await fetchUpstream(ctx, AddressTransactionsSchema, addressUrl(ctx, address, '/txs'));
  const summaries = transactions.slice(0, limit).map((tx) => summarizeTransaction(tx, address));

  return {
    address,
    total_transactions: transactions.length,
    returned_transactions: summaries.length,
    transactions: summaries,
  };
}

async function fetchUtxos(ctx: HandlerContext, address: string): Promise<AddressUtxos> {
  const utxos = await fetchUpstream(ctx, UtxoListSchema, addressUrl(ctx, address, '/utxo'));

  return {
    address,
    utxo_count: utxos.length,
    total_value: utxos.reduce((sum, utxo) => sum + utxo.value, 0),
    utxos: utxos.map((utxo) => ({
      txid: utxo.txid,
      vout: utxo.vout,
      value: utxo.value,
      confirmed: utxo.status.confirmed,
      block_height: utxo.status.block_height ?? null,
      block_hash: utxo.status.block_hash ?? null,
      block_time: utxo.status.block_time ?? null,
    })),
  };
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * Local decode first (checksum, version, witness rules), then the node's
 * own verdict, which also reflects the network the node runs on.
 */
export async function validateAddress(params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const { address } = parseParams(AddressParams, params);
  const decoded = decodeAddress(address);
  const result = await ctx.rpc.validateAddress(address, { signal: ctx.signal });

  return {
    address,
    is_valid: result.isvalid,
    is_script: result.isscript ?? false,
    is_witness: result.iswitness ?? false,
    witness_version: result.witness_version ?? null,
    witness_program: result.witness_program ?? null,
    script_type: decoded?.scriptType ?? null,
    network: decoded?.network ?? null,
    address_type: classifyAddress(address),
  };
}

export async function getAddressBalance(params: JsonRpcParams, ctx: HandlerContext): Promise<AddressBalance> {
  const { address } = parseParams(AddressParams, params);
  return fetchBalance(ctx, address);
}

export async function getAddressTransactions(params: JsonRpcParams, ctx: HandlerContext): Promise<AddressTransactions> {
  const { address, limit } = parseParams(AddressTransactionsParams, params);
  return fetchTransactions(ctx, address, limit);
}

export async function getAddressUtxos(params: JsonRpcParams, ctx: HandlerContext): Promise<AddressUtxos> {
  const { address } = parseParams(AddressParams, params);
  return fetchUtxos(ctx, address);
}

/**
 * Balance, recent history and UTXO set folded into one activity report.
 * Received/sent totals cover the most recent transactions only.
 */
export async function analyzeAddressActivity(
  params: JsonRpcParams,
  ctx: HandlerContext
): Promise<Record<string, unknown>> {
  const { address } = parseParams(AddressParams, params);
  const [balance, history, utxos] = await Promise.all([
    fetchBalance(ctx, address),
    fetchTransactions(ctx, address, ANALYSIS_WINDOW),
    fetchUtxos(ctx, address),
  ]);

  const transactions = history.transactions;
  const totalReceived = transactions.reduce((sum, tx) => sum + tx.value.output, 0);
  const totalSent = transactions.reduce((sum, tx) => sum + tx.value.input, 0);

  const confirmedTimes = transactions
    .filter((tx) => tx.confirmed)
    .map((tx) => tx.block_time ?? 0);
  const recent = transactions.slice(0, RECENT_ACTIVITY_SIZE);

  return {
    address,
    address_type: classifyAddress(address),
    summary: {
      current_balance: balance.balance.total,
      total_received: totalReceived,
      total_sent: totalSent,
      transaction_count: balance.transaction_count.total,
      utxo_count: utxos.utxo_count,
      first_transaction: confirmedTimes.length > 0 ? Math.min(...confirmedTimes) : null,
      last_transaction: confirmedTimes.length > 0 ? Math.max(...confirmedTimes) : null,
    },
    balance_details: balance.balance,
    recent_activity: {
      last_10_transactions: recent,
      pending_transactions: recent.filter((tx) => !tx.confirmed),
    },
    utxo_analysis: {
      total_utxos: utxos.utxo_count,
      total_utxo_value: utxos.total_value,
      largest_utxo: utxos.utxos.reduce((max, utxo) => Math.max(max, utxo.value), 0),
    },
  };
}

export const addressHandlers: HandlerBinding[] = [
  { method: 'validate_address', handler: validateAddress },
  { method: 'get_address_balance', handler: getAddressBalance },
  { method: 'get_address_transactions', handler: getAddressTransactions },
  { method: 'get_address_utxos', handler: getAddressUtxos },
  { method: 'analyze_address_activity', handler: analyzeAddressActivity },
];
