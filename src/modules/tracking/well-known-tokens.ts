/** Symbols accepted in place of a mint address for token lookups. */
export const WELL_KNOWN_TOKEN_MINTS: Readonly<Record<string, string>> = Object.freeze({
  SOL: 'So11111111111111111111111111111111111111112',
  USDC: 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v',
  USDT: 'Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB',
});
