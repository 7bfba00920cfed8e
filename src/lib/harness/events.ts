import type { LifecyclePhase } from '../lifecycle/phases';

export interface RunSummary {
  runID: string;
  iterations: number;
  threadCount: number;
  /** Triggers that finished without throwing */
  succeeded: number;
  failed: number;
  durationMS: number;
}

export interface HarnessEventMap {
  'run:started': { runID: string; iterations: number; threadCount: number };
  'run:completed': RunSummary;
  'run:failed': { runID: string; error: Error };
  'lifecycle:invoked': {
    phase: LifecyclePhase;
    targetName: string;
    methods: string[];
    runID?: string;
  };
  'trigger:failed': { runID: string; iteration: number; error: Error };
  'service:added': { identifier: string };
  'service:enabled': { identifier: string };
  'service:disabled': { identifier: string };
  'service:removed': { identifier: string };
}

export type HarnessEventName = keyof HarnessEventMap;

export type HarnessEmit = <K extends HarnessEventName>(
  event: K,
  data: HarnessEventMap[K],
) => void;

export class HarnessEvents {
  constructor(private readonly emit: HarnessEmit) {}

  public runStarted(runID: string, iterations: number, threadCount: number): void {
    this.emit('run:started', { runID, iterations, threadCount });
  }

  public runCompleted(summary: RunSummary): void {
    this.emit('run:completed', summary);
  }

  public runFailed(runID: string, error: Error): void {
    this.emit('run:failed', { runID, error });
  }

  public lifecycleInvoked(
    phase: LifecyclePhase,
    targetName: string,
    methods: string[],
    runID?: string,
  ): void {
    this.emit('lifecycle:invoked', { phase, targetName, methods, runID });
  }

  public triggerFailed(runID: string, iteration: number, error: Error): void {
    this.emit('trigger:failed', { runID, iteration, error });
  }

  public serviceAdded(identifier: string): void {
    this.emit('service:added', { identifier });
  }

  public serviceEnabled(identifier: string): void {
    this.emit('service:enabled', { identifier });
  }

  public serviceDisabled(identifier: string): void {
    this.emit('service:disabled', { identifier });
  }

  public serviceRemoved(identifier: string): void {
    this.emit('service:removed', { identifier });
  }
}
