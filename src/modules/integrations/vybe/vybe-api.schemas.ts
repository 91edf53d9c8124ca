import { z } from 'zod';

// Vybe serializes most numeric fields as strings.
const numericSchema = z.coerce.number();
const optionalNumericSchema = numericSchema.nullish();
const optionalStringSchema = z.string().nullish();

export const vybeTransferSchema = z.object({
  signature: z.string().min(1),
  blockTime: z.coerce.number().int().nonnegative(),
  senderAddress: z.string().min(1),
  receiverAddress: z.string().min(1),
  mintAddress: z.string().min(1),
  calculatedAmount: optionalNumericSchema,
  valueUsd: optionalNumericSchema,
  symbol: optionalStringSchema,
});

export const vybeTransfersResponseSchema = z.object({
  transfers: z.array(z.unknown()).default([]),
});

export const vybeTokenStatsSchema = z.object({
  mintAddress: optionalStringSchema,
  symbol: optionalStringSchema,
  name: optionalStringSchema,
  price: optionalNumericSchema,
  priceUsd: optionalNumericSchema,
  price1d: optionalNumericSchema,
  priceChange24h: optionalNumericSchema,
  marketCap: optionalNumericSchema,
  volume24h: optionalNumericSchema,
  usdValueVolume24h: optionalNumericSchema,
});

export const vybeTokenBalanceSchema = z.object({
  mintAddress: z.string().min(1),
  symbol: optionalStringSchema,
  name: optionalStringSchema,
  amount: numericSchema.default(0),
  valueUsd: numericSchema.default(0),
  priceUsd: optionalNumericSchema,
});

export const vybeWalletBalanceResponseSchema = z.object({
  totalTokenValueUsd: numericSchema.default(0),
  totalTokenValueUsd1dChange: optionalNumericSchema,
  totalTokenCount: z.coerce.number().int().nonnegative().optional(),
  data: z.array(vybeTokenBalanceSchema).default([]),
});

export const vybeTopHolderSchema = z.object({
  rank: z.coerce.number().int().positive(),
  ownerAddress: z.string().min(1),
  ownerName: optionalStringSchema,
  balance: numericSchema.default(0),
  valueUsd: numericSchema.default(0),
  percentageOfSupplyHeld: numericSchema.default(0),
  tokenSymbol: optionalStringSchema,
});

export const vybeTopHoldersResponseSchema = z.object({
  data: z.array(vybeTopHolderSchema).default([]),
});

export type VybeTransfer = z.infer<typeof vybeTransferSchema>;
export type VybeTokenStats = z.infer<typeof vybeTokenStatsSchema>;
export type VybeWalletBalanceResponse = z.infer<typeof vybeWalletBalanceResponseSchema>;
export type VybeTopHolder = z.infer<typeof vybeTopHolderSchema>;
