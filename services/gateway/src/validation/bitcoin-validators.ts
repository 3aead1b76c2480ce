/**
 * Bitcoin literal validators
 *
 * Addresses are decoded, not pattern-matched: base58check addresses must
 * carry a valid double-SHA256 checksum and a known version byte, segwit
 * addresses must decode as bech32 (v0) or bech32m (v1+) with a program
 * length the witness version allows.
 */

import { sha256 } from '@noble/hashes/sha256';
import { base58check, bech32, bech32m } from '@scure/base';

export type AddressNetwork = 'mainnet' | 'testnet' | 'regtest';

export type AddressEncoding = 'base58check' | 'bech32' | 'bech32m';

export type ScriptType = 'P2PKH' | 'P2SH' | 'P2WPKH' | 'P2WSH' | 'P2TR' | 'WitnessUnknown';

/** Coarse label reported to callers; any non-mainnet address is 'Testnet'. */
export type AddressType = 'P2PKH' | 'P2SH' | 'P2WPKH' | 'P2WSH' | 'P2TR' | 'Testnet' | 'Unknown';

export interface DecodedAddress {
  address: string;
  network: AddressNetwork;
  encoding: AddressEncoding;
  scriptType: ScriptType;
  witnessVersion?: number;
  /** Hash or witness program, hex */
  program: string;
}

export const MAX_BLOCK_HEIGHT = 10_000_000;

const HASH_PATTERN = /^[0-9a-fA-F]{64}$/;

const base58 = base58check(sha256);

// Regtest shares testnet's base58 version bytes.
const BASE58_VERSIONS: Record<number, { network: AddressNetwork; scriptType: ScriptType }> = {
  0x00: { network: 'mainnet', scriptType: 'P2PKH' },
  0x05: { network: 'mainnet', scriptType: 'P2SH' },
  0x6f: { network: 'testnet', scriptType: 'P2PKH' },
  0xc4: { network: 'testnet', scriptType: 'P2SH' },
};

const SEGWIT_PREFIXES: Record<string, AddressNetwork> = {
  bc: 'mainnet',
  tb: 'testnet',
  bcrt: 'regtest',
};

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

function decodeBase58Address(address: string): DecodedAddress | undefined {
  let payload: Uint8Array;
  try {
    payload = base58.decode(address);
  } catch {
    return undefined;
  }
  if (payload.length !== 21) {
    return undefined;
  }
  const version = BASE58_VERSIONS[payload[0]];
  if (!version) {
    return undefined;
  }
  return {
    address,
    network: version.network,
    encoding: 'base58check',
    scriptType: version.scriptType,
    program: toHex(payload.subarray(1)),
  };
}

function segwitScriptType(witnessVersion: number, programLength: number): ScriptType | undefined {
  if (witnessVersion === 0) {
    if (programLength === 20) return 'P2WPKH';
    if (programLength === 32) return 'P2WSH';
    return undefined;
  }
  if (programLength < 2 || programLength > 40) {
    return undefined;
  }
  return witnessVersion === 1 && programLength === 32 ? 'P2TR' : 'WitnessUnknown';
}

function decodeSegwitAddress(address: string): DecodedAddress | undefined {
  // v0 programs use bech32, v1+ use bech32m (BIP-350); the checksum decides.
  const asBech32 = bech32.decodeUnsafe(address);
  const encoding: AddressEncoding = asBech32 ? 'bech32' : 'bech32m';
  const decoded = asBech32 || bech32m.decodeUnsafe(address);
  if (!decoded || decoded.words.length === 0) {
    return undefined;
  }

  const network = SEGWIT_PREFIXES[decoded.prefix.toLowerCase()];
  if (!network) {
    return undefined;
  }

  const [witnessVersion, ...programWords] = decoded.words;
  if (witnessVersion > 16) {
    return undefined;
  }
  if ((witnessVersion === 0) !== (encoding === 'bech32')) {
    return undefined;
  }

  const program = bech32.fromWordsUnsafe(programWords);
  if (!program) {
    return undefined;
  }
  const scriptType = segwitScriptType(witnessVersion, program.length);
  if (!scriptType) {
    return undefined;
  }

  return {
    address,
    network,
    encoding,
    scriptType,
    witnessVersion,
    program: toHex(program),
  };
}

/**
 * Decode a Bitcoin address of any supported network.
 *
 * @returns undefined when the string is not a well-formed address
 */
export function decodeAddress(address: string): DecodedAddress | undefined {
  const trimmed = address.trim();
  if (trimmed.length < 14 || trimmed.length > 90) {
    return undefined;
  }
  if (/^(bc|tb|bcrt)1/i.test(trimmed)) {
    return decodeSegwitAddress(trimmed);
  }
  return decodeBase58Address(trimmed);
}

export function isValidBitcoinAddress(address: unknown): address is string {
  return typeof address === 'string' && decodeAddress(address) !== undefined;
}

/**
 * Address type label for responses.
 */
export function classifyAddress(address: string): AddressType {
  const decoded = decodeAddress(address);
  if (!decoded) {
    return 'Unknown';
  }
  if (decoded.network !== 'mainnet') {
    return 'Testnet';
  }
  return decoded.scriptType === 'WitnessUnknown' ? 'Unknown' : decoded.scriptType;
}

/** Transaction ids and block hashes: 64 hex characters. */
export function isValidHash(value: unknown): value is string {
  return typeof value === 'string' && HASH_PATTERN.test(value);
}

export function isValidBlockHeight(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_BLOCK_HEIGHT;
}
