export const PROCESSOR_PHASES = [
  'added',
  'scheduled',
  'unscheduled',
  'stopped',
  'shutdown',
] as const;

export const SERVICE_PHASES = [
  'added',
  'enabled',
  'disabled',
  'removed',
] as const;

export type ProcessorPhase = (typeof PROCESSOR_PHASES)[number];
export type ServicePhase = (typeof SERVICE_PHASES)[number];
export type LifecyclePhase = ProcessorPhase | ServicePhase;

export const LIFECYCLE_PHASES: readonly LifecyclePhase[] = [
  ...PROCESSOR_PHASES,
  'enabled',
  'disabled',
  'removed',
];

/**
 * Kinds of context object a hook can ask for. Call arguments are matched to
 * a hook's declared parameters by this discriminant.
 */
export type LifecycleArgumentKind = 'process-context' | 'configuration-context';

export interface LifecycleArgument {
  readonly kind: LifecycleArgumentKind;
}
