import type { IPollCycleStatus } from '../modules/polling/polling.interfaces';

export type ComponentHealth = {
  readonly ok: boolean;
  readonly details: string;
};

export type AppHealthStatus = {
  readonly status: 'ok' | 'degraded';
  readonly version: string;
  readonly database: ComponentHealth;
  readonly telegram: ComponentHealth;
  readonly pollCycles: readonly IPollCycleStatus[];
  readonly seenEvents: number;
};
