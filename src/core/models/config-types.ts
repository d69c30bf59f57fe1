/**
 * Engine configuration types (project config file and env overrides)
 */

/** Debug configuration for stepgraph */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** What to do when the recent dispatches keep repeating one cycle */
export type LoopAction = 'abort' | 'warn' | 'ignore';

/** Cycle detection configuration */
export interface LoopDetectionConfig {
  /** Passes through the same cycle (a -> a, a -> b -> a, ...) before it is reported */
  maxCycleRepeats?: number;
  action?: LoopAction;
}

/** Normalized engine configuration */
export interface EngineConfig {
  stepLimit: number;
  retryBudget: number;
  logLevel: LogLevel;
  verbose: boolean;
  debug?: DebugConfig;
  loopDetection?: LoopDetectionConfig;
}
