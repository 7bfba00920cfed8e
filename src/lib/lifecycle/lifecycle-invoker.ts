import { LifecycleInvocationError, toError } from '../errors';
import type { LoggerService } from '../logger';
import { isFunction, isString } from '../type-guards';
import { LIFECYCLE_PHASES } from './phases';
import type {
  LifecycleArgument,
  LifecycleArgumentKind,
  LifecyclePhase,
} from './phases';

/**
 * Public method names of T
 */
export type MethodKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

export interface LifecycleHookDeclaration<T> {
  method: MethodKeys<T>;
  /** Argument kinds, in call order. Omit for a no-argument hook. */
  parameters?: LifecycleArgumentKind[];
}

export type LifecycleHookTable<T> = Partial<
  Record<LifecyclePhase, LifecycleHookDeclaration<T>[]>
>;

export interface LifecycleHook {
  readonly method: string;
  readonly parameters: readonly LifecycleArgumentKind[];
}

type AnyConstructor<T> = abstract new (...args: never[]) => T;

type PhaseHooks = Partial<Record<LifecyclePhase, LifecycleHook[]>>;

// Written only by declareLifecycleHooks
const declaredHooks = new WeakMap<object, PhaseHooks>();
let resolvedHooks = new WeakMap<object, Map<LifecyclePhase, LifecycleHook[]>>();

/**
 * Register the methods a class wants called for each lifecycle phase.
 * Declarations on a base class apply to every subclass and run first.
 *
 * ```typescript
 * declareLifecycleHooks(SplitText, {
 *   scheduled: [{ method: 'setup', parameters: ['process-context'] }],
 *   stopped: [{ method: 'cleanup' }],
 * });
 * ```
 */
export function declareLifecycleHooks<T extends object>(
  Type: AnyConstructor<T>,
  table: LifecycleHookTable<T>,
): void {
  const hooks: PhaseHooks = declaredHooks.get(Type) ?? {};

  for (const phase of LIFECYCLE_PHASES) {
    const declarations = table[phase];

    if (!declarations) {
      continue;
    }

    const list = hooks[phase] ?? [];

    for (const declaration of declarations) {
      list.push({
        method: declaration.method,
        parameters: [...(declaration.parameters ?? [])],
      });
    }

    hooks[phase] = list;
  }

  declaredHooks.set(Type, hooks);

  // Subclasses may have cached a chain that includes Type
  resolvedHooks = new WeakMap();
}

/**
 * Constructors from the root ancestor down to the target's own class
 */
function constructorChain(target: object): object[] {
  const chain: object[] = [];
  let proto: unknown = Object.getPrototypeOf(target);

  while (
    typeof proto === 'object' &&
    proto !== null &&
    proto !== Object.prototype
  ) {
    const ctor: unknown = Reflect.get(proto, 'constructor');

    if (typeof ctor === 'function' && Reflect.get(ctor, 'prototype') === proto) {
      chain.unshift(ctor);
    }

    proto = Object.getPrototypeOf(proto);
  }

  return chain;
}

/**
 * Hooks that `invoke(phase, target)` would call, in call order
 */
export function resolveLifecycleHooks(
  target: object,
  phase: LifecyclePhase,
): readonly LifecycleHook[] {
  const chain = constructorChain(target);
  const own = chain[chain.length - 1];

  if (!own) {
    return [];
  }

  const cached = resolvedHooks.get(own)?.get(phase);

  if (cached) {
    return cached;
  }

  const seen = new Set<string>();
  const resolved: LifecycleHook[] = [];

  for (const ctor of chain) {
    for (const hook of declaredHooks.get(ctor)?.[phase] ?? []) {
      if (!seen.has(hook.method)) {
        seen.add(hook.method);
        resolved.push(hook);
      }
    }
  }

  const perPhase =
    resolvedHooks.get(own) ?? new Map<LifecyclePhase, LifecycleHook[]>();
  perPhase.set(phase, resolved);
  resolvedHooks.set(own, perPhase);

  return resolved;
}

/**
 * Display name for errors and logs: getName(), then getIdentifier(), then the class name
 */
export function describeTarget(target: object): string {
  for (const accessor of ['getName', 'getIdentifier']) {
    const fn: unknown = Reflect.get(target, accessor);

    if (isFunction(fn)) {
      const value = fn.call(target);

      if (isString(value) && value.length > 0) {
        return value;
      }
    }
  }

  return target.constructor.name;
}

/**
 * Calls the hooks declared for a phase, one at a time, awaiting each.
 * The first hook that can't be called or fails stops the phase.
 */
export class LifecycleInvoker {
  private readonly logger?: LoggerService;

  constructor(options: { logger?: LoggerService } = {}) {
    this.logger = options.logger;
  }

  /**
   * @returns Names of the methods that ran
   */
  public async invoke(
    phase: LifecyclePhase,
    target: object,
    ...callArguments: LifecycleArgument[]
  ): Promise<string[]> {
    const hooks = resolveLifecycleHooks(target, phase);
    const targetName = describeTarget(target);
    const invoked: string[] = [];

    for (const hook of hooks) {
      const fail = (reason?: string, cause?: Error): LifecycleInvocationError =>
        new LifecycleInvocationError(
          { phase, targetName, methodName: hook.method, reason },
          cause,
        );

      const fn: unknown = Reflect.get(target, hook.method);

      if (!isFunction(fn)) {
        throw fail('method is not a function');
      }

      const args: LifecycleArgument[] = [];

      for (const kind of hook.parameters) {
        const match = callArguments.find((argument) => argument.kind === kind);

        if (!match) {
          throw fail(`no ${kind} argument supplied`);
        }

        args.push(match);
      }

      this.logger?.debug('Invoking {{phase}} hook {{target}}.{{method}}', {
        params: { phase, target: targetName, method: hook.method },
      });

      try {
        await fn.apply(target, args);
      } catch (error) {
        throw fail(undefined, toError(error));
      }

      invoked.push(hook.method);
    }

    return invoked;
  }
}
