export enum PollCycleName {
  WALLET_TRACKING = 'wallet_tracking',
  WHALE_ALERT = 'whale_alert',
}

export enum PollCycleState {
  IDLE = 'idle',
  RUNNING = 'running',
  SUSPENDED = 'suspended',
}

export interface ITickContext {
  readonly startedAt: Date;
  /** True once shutdown began; a tick seeing it after fetching must drop its batch. */
  isStopping(): boolean;
}

export interface ITickReport {
  readonly cycle: PollCycleName;
  readonly entities: number;
  readonly failedEntities: number;
  readonly eventsFetched: number;
  readonly newEvents: number;
  readonly intents: number;
  readonly abandoned: boolean;
}

export interface IPollCycle {
  readonly name: PollCycleName;
  runTick(context: ITickContext): Promise<ITickReport>;
}

export interface IPollCycleRunnerOptions {
  readonly enabled: boolean;
  readonly intervalMs: number;
  readonly initialDelayMs: number;
}

export interface IPollCycleStatus {
  readonly cycle: PollCycleName;
  readonly state: PollCycleState;
  readonly intervalMs: number;
  readonly completedTicks: number;
  readonly skippedTicks: number;
  readonly failedTicks: number;
  readonly lastTickStartedAt: Date | null;
  readonly lastTickFinishedAt: Date | null;
  readonly lastReport: ITickReport | null;
}
