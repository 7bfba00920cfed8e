import type { LifecyclePhase } from './lifecycle/phases';

export const ERR_PREFIX = 'HarnessErr';

export type HarnessErrorType =
  | 'Configuration'
  | 'Lifecycle'
  | 'Trigger'
  | 'Service'
  | 'Assertion'
  | 'Flow';

function withCause(message: string, cause?: Error): string {
  return cause ? `${message}: ${cause.message}` : message;
}

/**
 * Normalise anything thrown into an Error, keeping Errors as they are
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  let text: string;

  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }

  return new Error(`Non-error value thrown: ${text}`);
}

/**
 * Bad options, bad iteration counts, raising the thread count of a
 * processor that must run serially.
 */
export class HarnessConfigurationError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Configuration';
  public errCode = 'InvalidConfiguration';
  public additionalInfo: Record<string, unknown>;

  constructor(message: string, additionalInfo: Record<string, unknown> = {}) {
    super(message);
    this.name = 'HarnessConfigurationError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Operation not allowed in the harness' current state (e.g. overlapping runs)
 */
export class HarnessStateError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Lifecycle';
  public errCode = 'InvalidState';
  public additionalInfo: Record<string, unknown>;

  constructor(message: string, additionalInfo: Record<string, unknown> = {}) {
    super(message);
    this.name = 'HarnessStateError';
    this.additionalInfo = additionalInfo;
  }
}

export class HarnessAssertionError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Assertion';
  public errCode = 'AssertionFailed';
  public additionalInfo: { expected?: unknown; actual?: unknown } & Record<
    string,
    unknown
  >;

  constructor(
    message: string,
    additionalInfo: { expected?: unknown; actual?: unknown } & Record<
      string,
      unknown
    > = {},
  ) {
    super(message);
    this.name = 'HarnessAssertionError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * A lifecycle hook could not be called, or threw. Wraps the hook's error as `cause`.
 */
export class LifecycleInvocationError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Lifecycle';
  public errCode = 'HookFailed';
  public additionalInfo: {
    phase: LifecyclePhase;
    targetName: string;
    methodName: string;
    reason?: string;
  };

  constructor(
    additionalInfo: {
      phase: LifecyclePhase;
      targetName: string;
      methodName: string;
      reason?: string;
    },
    cause?: Error,
  ) {
    const base = `Lifecycle hook ${additionalInfo.targetName}.${additionalInfo.methodName} failed during "${additionalInfo.phase}"`;
    const reason = additionalInfo.reason ? ` (${additionalInfo.reason})` : '';

    super(withCause(base + reason, cause), { cause });
    this.name = 'LifecycleInvocationError';
    this.additionalInfo = additionalInfo;
  }
}

export class TriggerFailureError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Trigger';
  public errCode = 'TriggerFailed';
  public additionalInfo: {
    processorName: string;
    runID: string;
    iteration: number;
  };

  constructor(
    additionalInfo: { processorName: string; runID: string; iteration: number },
    cause: Error,
  ) {
    super(
      withCause(
        `Processor "${additionalInfo.processorName}" failed on iteration ${additionalInfo.iteration}`,
        cause,
      ),
      { cause },
    );
    this.name = 'TriggerFailureError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Every failed trigger of a run, in submission order
 */
export class AggregateTriggerError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Trigger';
  public errCode = 'MultipleTriggersFailed';
  public additionalInfo: {
    processorName: string;
    runID: string;
    iterations: number[];
  };
  public readonly errors: TriggerFailureError[];

  constructor(
    additionalInfo: { processorName: string; runID: string },
    errors: TriggerFailureError[],
  ) {
    super(
      `Processor "${additionalInfo.processorName}" failed on ${errors.length} iteration(s)`,
      { cause: errors[0] },
    );
    this.name = 'AggregateTriggerError';
    this.errors = errors;
    this.additionalInfo = {
      ...additionalInfo,
      iterations: errors.map((error) => error.additionalInfo.iteration),
    };
  }
}

export class UnknownServiceError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Service';
  public errCode = 'NotFound';
  public additionalInfo: { identifier: string };

  constructor(additionalInfo: { identifier: string }) {
    super(`No controller service registered as "${additionalInfo.identifier}"`);
    this.name = 'UnknownServiceError';
    this.additionalInfo = additionalInfo;
  }
}

export class UnknownRelationshipError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Flow';
  public errCode = 'UnknownRelationship';
  public additionalInfo: { relationship: string; processorName: string };

  constructor(additionalInfo: { relationship: string; processorName: string }) {
    super(
      `Relationship "${additionalInfo.relationship}" is not defined by processor "${additionalInfo.processorName}"`,
    );
    this.name = 'UnknownRelationshipError';
    this.additionalInfo = additionalInfo;
  }
}

export class UnknownPropertyError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Configuration';
  public errCode = 'UnknownProperty';
  public additionalInfo: { propertyName: string; targetName: string };

  constructor(additionalInfo: { propertyName: string; targetName: string }) {
    super(
      `"${additionalInfo.targetName}" has no property named "${additionalInfo.propertyName}"`,
    );
    this.name = 'UnknownPropertyError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Duplicate identifier, or a service whose initialization failed
 */
export class ServiceRegistrationError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Service';
  public errCode = 'RegistrationFailed';
  public additionalInfo: { identifier: string } & Record<string, unknown>;

  constructor(
    message: string,
    additionalInfo: { identifier: string } & Record<string, unknown>,
    cause?: Error,
  ) {
    super(withCause(message, cause), { cause });
    this.name = 'ServiceRegistrationError';
    this.additionalInfo = additionalInfo;
  }
}

export type ServiceOperation =
  | 'add'
  | 'enable'
  | 'disable'
  | 'remove'
  | 'setProperty'
  | 'removeProperty'
  | 'setAnnotationData';

export class ServiceStateError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Service';
  public errCode = 'InvalidState';
  public additionalInfo: {
    identifier: string;
    operation: ServiceOperation;
    enabled: boolean;
    /** Transition still running when `operation` was attempted */
    inProgress?: ServiceOperation;
  };

  constructor(additionalInfo: {
    identifier: string;
    operation: ServiceOperation;
    enabled: boolean;
    inProgress?: ServiceOperation;
  }) {
    const { identifier, operation, enabled, inProgress } = additionalInfo;

    super(
      inProgress
        ? `Cannot ${operation} controller service "${identifier}" while ${inProgress} is in progress`
        : `Cannot ${operation} controller service "${identifier}" while it is ${enabled ? 'enabled' : 'disabled'}`,
    );
    this.name = 'ServiceStateError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Misuse of a session: stale flow file versions, unaccounted flow files at
 * commit, using a flow file that belongs to another session.
 */
export class FlowFileHandlingError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Flow';
  public errCode = 'HandlingFailed';
  public additionalInfo: Record<string, unknown>;

  constructor(message: string, additionalInfo: Record<string, unknown> = {}) {
    super(message);
    this.name = 'FlowFileHandlingError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Names must match `/^[a-z][a-z0-9]*(-[a-z0-9]+)*$/`:
 * 'split-text' and 'route-v2' pass, 'SplitText' and 'split_text' do not.
 */
export class InvalidNameError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Configuration';
  public errCode = 'InvalidName';
  public additionalInfo: { name: string; kind: string };

  constructor(additionalInfo: { name: string; kind: string }) {
    const rule =
      additionalInfo.kind === 'processor'
        ? 'Names must be kebab-case (lowercase letters, numbers, and hyphens only).'
        : 'Names must not be blank.';

    super(`Invalid ${additionalInfo.kind} name: "${additionalInfo.name}". ${rule}`);
    this.name = 'InvalidNameError';
    this.additionalInfo = additionalInfo;
  }
}

export class WorkerPoolShutdownError extends Error {
  public errPrefix = ERR_PREFIX;
  public errType: HarnessErrorType = 'Lifecycle';
  public errCode = 'PoolShutdown';
  public additionalInfo: { poolSize: number };

  constructor(additionalInfo: { poolSize: number }) {
    super('Worker pool has been shut down and accepts no new tasks');
    this.name = 'WorkerPoolShutdownError';
    this.additionalInfo = additionalInfo;
  }
}
