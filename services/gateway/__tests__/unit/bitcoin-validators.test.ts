/**
 * Unit Tests for Bitcoin literal validators
 *
 * Address fixtures encode the byte sequences 0x01..0x14 (20-byte hash) and
 * 0x01..0x20 (32-byte program) under each supported encoding.
 */

import { describe, it, expect } from '@jest/globals';
import {
  classifyAddress,
  decodeAddress,
  isValidBitcoinAddress,
  isValidBlockHeight,
  isValidHash,
  MAX_BLOCK_HEIGHT,
} from '../../src/validation/bitcoin-validators';

const HASH20 = '0102030405060708090a0b0c0d0e0f1011121314';
const HASH32 = '0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20';

const ADDRESSES = {
  p2pkh: '16L5yRNPTuciSgXGHqYwn9N6NeoKqopAu',
  p2sh: '31nM1WuowNDzocNxPPW9NQWJEtwWpjfcLj',
  testnetP2pkh: 'mfcHP2WMCVLsVZA8yrovmhMgxNFW9r98xw',
  testnetP2sh: '2MsLZ5FqqYpjM1Q1W4X81zMVZTF9gdbhVwd',
  p2wpkh: 'bc1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5fcj4z3',
  p2wsh: 'bc1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5z5tpwxqergd3c8g7rusqyp0mu0',
  p2tr: 'bc1pqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5z5tpwxqergd3c8g7rusqwk0jyn',
  testnetP2wpkh: 'tb1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5r7fxez',
  regtestP2wpkh: 'bcrt1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5phstwt',
  witnessV2: 'bc1zqypqxpq9qcrsszg2pvxq6rs0zqss2fw7',
};

describe('decodeAddress', () => {
  it('should decode a mainnet P2PKH address', () => {
    expect(decodeAddress(ADDRESSES.p2pkh)).toEqual({
      address: ADDRESSES.p2pkh,
      network: 'mainnet',
      encoding: 'base58check',
      scriptType: 'P2PKH',
      program: HASH20,
    });
  });

  it('should decode a mainnet P2SH address', () => {
    expect(decodeAddress(ADDRESSES.p2sh)).toMatchObject({ network: 'mainnet', scriptType: 'P2SH' });
  });

  it('should decode testnet base58 addresses', () => {
    expect(decodeAddress(ADDRESSES.testnetP2pkh)).toMatchObject({ network: 'testnet', scriptType: 'P2PKH' });
    expect(decodeAddress(ADDRESSES.testnetP2sh)).toMatchObject({ network: 'testnet', scriptType: 'P2SH' });
  });

  it('should decode a P2WPKH address with its witness program', () => {
    expect(decodeAddress(ADDRESSES.p2wpkh)).toEqual({
      address: ADDRESSES.p2wpkh,
      network: 'mainnet',
      encoding: 'bech32',
      scriptType: 'P2WPKH',
      witnessVersion: 0,
      program: HASH20,
    });
  });

  it('should decode P2WSH and P2TR addresses', () => {
    expect(decodeAddress(ADDRESSES.p2wsh)).toMatchObject({ scriptType: 'P2WSH', program: HASH32 });
    expect(decodeAddress(ADDRESSES.p2tr)).toMatchObject({
      encoding: 'bech32m',
      scriptType: 'P2TR',
      witnessVersion: 1,
      program: HASH32,
    });
  });

  it('should decode testnet and regtest segwit prefixes', () => {
    expect(decodeAddress(ADDRESSES.testnetP2wpkh)).toMatchObject({ network: 'testnet', scriptType: 'P2WPKH' });
    expect(decodeAddress(ADDRESSES.regtestP2wpkh)).toMatchObject({ network: 'regtest', scriptType: 'P2WPKH' });
  });

  it('should accept an upper-case bech32 address', () => {
    expect(decodeAddress(ADDRESSES.p2wpkh.toUpperCase())).toMatchObject({ scriptType: 'P2WPKH' });
  });

  it('should decode future witness versions as WitnessUnknown', () => {
    expect(decodeAddress(ADDRESSES.witnessV2)).toMatchObject({
      encoding: 'bech32m',
      scriptType: 'WitnessUnknown',
      witnessVersion: 2,
    });
  });

  it('should reject a base58 address with a bad checksum', () => {
    expect(decodeAddress('16L5yRNPTuciSgXGHqYwn9N6NeoKqopAv')).toBeUndefined();
  });

  it('should reject a base58 address with an unknown version byte', () => {
    // version 0x30 over the same hash
    expect(decodeAddress('LKKHMBjCU89fyFNgSRprDoD8Jb25N8uWvd')).toBeUndefined();
  });

  it('should reject a bech32 address with a bad checksum', () => {
    expect(decodeAddress('bc1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5fcj4z4')).toBeUndefined();
  });

  it('should reject a witness v1 program checksummed as bech32', () => {
    expect(decodeAddress('bc1pqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5z5tpwxqergd3c8g7rusqm2l7p3')).toBeUndefined();
  });

  it('should reject a witness v0 program checksummed as bech32m', () => {
    expect(decodeAddress('bc1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5uyze8n')).toBeUndefined();
  });

  it('should reject an unknown segwit prefix', () => {
    expect(decodeAddress('ltc1qqypqxpq9qcrsszg2pvxq6rs0zqg3yyc5dyg36p')).toBeUndefined();
  });

  it('should reject strings that are not addresses', () => {
    expect(decodeAddress('')).toBeUndefined();
    expect(decodeAddress('not-an-address')).toBeUndefined();
    expect(decodeAddress('0'.repeat(34))).toBeUndefined();
  });
});

describe('isValidBitcoinAddress', () => {
  it('should accept every supported encoding', () => {
    for (const address of Object.values(ADDRESSES)) {
      expect(isValidBitcoinAddress(address)).toBe(true);
    }
  });

  it('should reject non-string values', () => {
    expect(isValidBitcoinAddress(42)).toBe(false);
    expect(isValidBitcoinAddress(undefined)).toBe(false);
  });
});

describe('classifyAddress', () => {
  it.each([
    [ADDRESSES.p2pkh, 'P2PKH'],
    [ADDRESSES.p2sh, 'P2SH'],
    [ADDRESSES.p2wpkh, 'P2WPKH'],
    [ADDRESSES.p2wsh, 'P2WSH'],
    [ADDRESSES.p2tr, 'P2TR'],
    [ADDRESSES.testnetP2pkh, 'Testnet'],
    [ADDRESSES.testnetP2sh, 'Testnet'],
    [ADDRESSES.testnetP2wpkh, 'Testnet'],
    [ADDRESSES.regtestP2wpkh, 'Testnet'],
    [ADDRESSES.witnessV2, 'Unknown'],
    ['garbage', 'Unknown'],
  ])('should classify %s as %s', (address, expected) => {
    expect(classifyAddress(address)).toBe(expected);
  });
});

describe('isValidHash', () => {
  it('should accept 64 hex characters in either case', () => {
    expect(isValidHash('ab'.repeat(32))).toBe(true);
    expect(isValidHash('AB'.repeat(32))).toBe(true);
  });

  it('should reject wrong lengths and non-hex characters', () => {
    expect(isValidHash('ab'.repeat(31))).toBe(false);
    expect(isValidHash('ab'.repeat(33))).toBe(false);
    expect(isValidHash('zz'.repeat(32))).toBe(false);
    expect(isValidHash(123)).toBe(false);
  });
});

describe('isValidBlockHeight', () => {
  it('should accept the genesis height and the upper bound', () => {
    expect(isValidBlockHeight(0)).toBe(true);
    expect(isValidBlockHeight(MAX_BLOCK_HEIGHT)).toBe(true);
  });

  it('should reject negative, fractional, oversized and non-numeric heights', () => {
    expect(isValidBlockHeight(-1)).toBe(false);
    expect(isValidBlockHeight(1.5)).toBe(false);
    expect(isValidBlockHeight(MAX_BLOCK_HEIGHT + 1)).toBe(false);
    expect(isValidBlockHeight('100')).toBe(false);
  });
});
