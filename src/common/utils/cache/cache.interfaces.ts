export interface ICacheStats {
  readonly keys: number;
  readonly hits: number;
  readonly misses: number;
}

export type ReadThroughCacheOptions = {
  readonly ttlSec: number;
  readonly maxKeys?: number;
  readonly checkperiod?: number;
};
