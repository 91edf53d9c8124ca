import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

const SOLANA_ADDRESS_EXAMPLE = '4vJ9JU1bJJE96FWSJKvHsmmFADCg4gpZQff4P3bkLKi';
const USDC_MINT_EXAMPLE = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';

// -- Wallets --

const WALLET_VIEW_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    address: { type: 'string', example: SOLANA_ADDRESS_EXAMPLE },
    createdAt: { type: 'string', format: 'date-time' },
  },
  required: ['address', 'createdAt'],
};

export const TRACK_WALLET_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    address: { type: 'string', example: SOLANA_ADDRESS_EXAMPLE },
  },
  required: ['address'],
};

export const TRACK_WALLET_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    ...WALLET_VIEW_SCHEMA.properties,
    created: { type: 'boolean' },
  },
  required: ['address', 'createdAt', 'created'],
};

export const WALLET_LIST_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    userId: { type: 'string' },
    wallets: { type: 'array', items: WALLET_VIEW_SCHEMA },
  },
  required: ['userId', 'wallets'],
};

export const UNTRACK_WALLET_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    address: { type: 'string' },
    removed: { type: 'boolean' },
  },
  required: ['address', 'removed'],
};

// -- Whale alerts --

export const WHALE_ALERT_CONFIG_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    tokenMints: { type: 'array', items: { type: 'string', example: USDC_MINT_EXAMPLE } },
    thresholdAmount: { type: 'number', minimum: 0, nullable: true, example: 50000 },
    enabled: { type: 'boolean' },
  },
  required: ['tokenMints', 'enabled'],
};

export const WHALE_ALERT_CONFIG_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    userId: { type: 'string' },
    tokenMints: { type: 'array', items: { type: 'string' } },
    thresholdAmount: { type: 'number' },
    enabled: { type: 'boolean' },
    updatedAt: { type: 'string', format: 'date-time' },
  },
  required: ['userId', 'tokenMints', 'thresholdAmount', 'enabled', 'updatedAt'],
};

// -- Market data --

export const WALLET_SNAPSHOT_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    ownerAddress: { type: 'string' },
    totalValueUsd: { type: 'number' },
    totalValueChange1dUsd: { type: 'number', nullable: true },
    tokenCount: { type: 'integer' },
    tokens: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          mintAddress: { type: 'string' },
          symbol: { type: 'string', nullable: true },
          name: { type: 'string', nullable: true },
          amount: { type: 'number' },
          valueUsd: { type: 'number' },
          priceUsd: { type: 'number', nullable: true },
        },
      },
    },
  },
  required: ['ownerAddress', 'totalValueUsd', 'tokenCount', 'tokens'],
};

export const TOKEN_STATS_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    mintAddress: { type: 'string', example: USDC_MINT_EXAMPLE },
    symbol: { type: 'string', nullable: true, example: 'USDC' },
    name: { type: 'string', nullable: true },
    priceUsd: { type: 'number', nullable: true },
    priceChange24hPct: { type: 'number', nullable: true },
    volume24hUsd: { type: 'number', nullable: true },
    marketCapUsd: { type: 'number', nullable: true },
  },
  required: ['mintAddress'],
};

export const TOP_HOLDERS_RESULT_SCHEMA: SchemaObject = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      rank: { type: 'integer' },
      ownerAddress: { type: 'string' },
      ownerName: { type: 'string', nullable: true },
      balance: { type: 'number' },
      valueUsd: { type: 'number' },
      percentageOfSupplyHeld: { type: 'number' },
      tokenSymbol: { type: 'string', nullable: true },
    },
  },
};

// -- Transactions --

const TRANSACTION_EVENT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    eventId: { type: 'string' },
    walletOrToken: { type: 'string' },
    signature: { type: 'string' },
    amount: { type: 'number', description: 'USD value' },
    tokenAmount: { type: 'number', nullable: true },
    tokenSymbol: { type: 'string', nullable: true, example: 'USDC' },
    tokenMint: { type: 'string', example: USDC_MINT_EXAMPLE },
    timestamp: { type: 'integer', description: 'Unix seconds' },
    direction: { type: 'string', enum: ['in', 'out'] },
    counterpartyAddress: { type: 'string' },
    senderAddress: { type: 'string' },
    receiverAddress: { type: 'string' },
  },
  required: ['eventId', 'signature', 'amount', 'tokenMint', 'timestamp', 'direction'],
};

export const RECENT_TRANSACTIONS_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    address: { type: 'string', example: SOLANA_ADDRESS_EXAMPLE },
    windowSec: { type: 'integer', example: 120 },
    transactions: { type: 'array', items: TRANSACTION_EVENT_SCHEMA },
  },
  required: ['address', 'windowSec', 'transactions'],
};

export const HIGHEST_TRANSACTION_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    windowSec: { type: 'integer', example: 120 },
    token: { type: 'string', nullable: true, description: 'Requested mint or symbol' },
    transaction: { ...TRANSACTION_EVENT_SCHEMA, nullable: true },
  },
  required: ['windowSec', 'token', 'transaction'],
};
