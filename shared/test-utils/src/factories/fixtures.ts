/**
 * Node payload fixtures.
 *
 * Shapes follow Bitcoin Core's RPC output; values are made up. Heights map
 * to hashes deterministically so routed stubs can answer any height.
 */

export function fakeBlockHash(height: number): string {
  return height.toString(16).padStart(64, '0');
}

export function blockchainInfoFixture(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    chain: 'main',
    blocks: 850000,
    headers: 850000,
    bestblockhash: fakeBlockHash(850000),
    difficulty: 79351228131136.9,
    mediantime: 1720000000,
    verificationprogress: 0.9999,
    initialblockdownload: false,
    chainwork: '0000000000000000000000000000000000000000823ab0f2b4e1b6c84f5c7a9f',
    size_on_disk: 650000000000,
    pruned: false,
    warnings: '',
    ...overrides,
  };
}

export function networkInfoFixture(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    version: 270000,
    subversion: '/Satoshi:27.0.0/',
    protocolversion: 70016,
    connections: 10,
    connections_in: 2,
    connections_out: 8,
    networkactive: true,
    relayfee: 0.00001,
    localservicesnames: ['NETWORK', 'WITNESS'],
    networks: [
      { name: 'ipv4', reachable: true, limited: false },
      { name: 'onion', reachable: false, limited: true },
    ],
    warnings: '',
    ...overrides,
  };
}

export function mempoolInfoFixture(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    loaded: true,
    size: 4200,
    bytes: 2100000,
    usage: 9000000,
    maxmempool: 300000000,
    mempoolminfee: 0.00001,
    minrelaytxfee: 0.00001,
    total_fee: 0.35,
    ...overrides,
  };
}

export function miningInfoFixture(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    blocks: 850000,
    difficulty: 79351228131136.9,
    networkhashps: 5.6e20,
    pooledtx: 4200,
    chain: 'main',
    warnings: '',
    ...overrides,
  };
}

export function blockHeaderFixture(height: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    hash: fakeBlockHash(height),
    confirmations: 1,
    height,
    version: 536870912,
    merkleroot: 'ab'.repeat(32),
    time: 1720000000 + height,
    mediantime: 1719999000 + height,
    nonce: 12345,
    bits: '17034219',
    difficulty: 79351228131136.9,
    nTx: 2,
    previousblockhash: height > 0 ? fakeBlockHash(height - 1) : undefined,
    ...overrides,
  };
}

export function rawTransactionFixture(txid: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    txid,
    hash: txid,
    version: 2,
    size: 225,
    vsize: 144,
    weight: 573,
    locktime: 0,
    vin: [{ txid: 'cd'.repeat(32), vout: 0, sequence: 4294967295 }],
    vout: [
      { value: 0.5, n: 0, scriptPubKey: { type: 'witness_v0_keyhash' } },
      { value: 0.25, n: 1, scriptPubKey: { type: 'pubkeyhash' } },
    ],
    blockhash: fakeBlockHash(850000),
    confirmations: 3,
    time: 1720000000,
    blocktime: 1720000000,
    ...overrides,
  };
}

export function blockFixture(height: number, tx: unknown[] = ['11'.repeat(32), '22'.repeat(32)]): Record<string, unknown> {
  return {
    ...blockHeaderFixture(height),
    size: 1500000,
    strippedsize: 800000,
    weight: 3990000,
    nTx: tx.length,
    tx,
  };
}
