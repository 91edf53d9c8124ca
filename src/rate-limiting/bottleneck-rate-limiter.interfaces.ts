export enum LimiterKey {
  VYBE = 'vybe',
  WALLET_POLL = 'wallet_poll',
  WHALE_POLL = 'whale_poll',
}

// Bottleneck priority: lower number = higher priority (0–9 range)
export enum RequestPriority {
  CRITICAL = 1,
  HIGH = 5,
  NORMAL = 7,
  LOW = 9,
}

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
}

export interface ILimiterMetrics {
  readonly queueSize: number;
  readonly running: number;
}
