import { describe, expect, test } from 'vitest';
import { LifecycleInvocationError } from '../errors';
import { sleep } from '../sleep';
import {
  LifecycleInvoker,
  declareLifecycleHooks,
  describeTarget,
  resolveLifecycleHooks,
} from './lifecycle-invoker';
import type { LifecycleArgument } from './phases';

const processContext: LifecycleArgument = { kind: 'process-context' };
const configurationContext: LifecycleArgument = {
  kind: 'configuration-context',
};

class BaseTarget {
  public calls: string[] = [];
  public received: unknown[][] = [];

  public getName(): string {
    return 'base-target';
  }

  public baseSetup(...args: unknown[]): void {
    this.calls.push('baseSetup');
    this.received.push(args);
  }
}

declareLifecycleHooks(BaseTarget, {
  scheduled: [{ method: 'baseSetup' }],
});

class ChildTarget extends BaseTarget {
  public getName(): string {
    return 'child-target';
  }

  public async childSetup(...args: unknown[]): Promise<void> {
    await sleep(5);
    this.calls.push('childSetup');
    this.received.push(args);
  }

  public afterChild(): void {
    this.calls.push('afterChild');
  }

  public withBoth(...args: unknown[]): void {
    this.calls.push('withBoth');
    this.received.push(args);
  }

  public explode(): void {
    throw new Error('hook exploded');
  }
}

declareLifecycleHooks(ChildTarget, {
  scheduled: [
    { method: 'childSetup', parameters: ['process-context'] },
    { method: 'afterChild' },
  ],
  enabled: [
    {
      method: 'withBoth',
      parameters: ['configuration-context', 'process-context'],
    },
  ],
  stopped: [{ method: 'explode' }, { method: 'afterChild' }],
});

describe('resolveLifecycleHooks', () => {
  test('lists ancestor hooks before the class own hooks', () => {
    const hooks = resolveLifecycleHooks(new ChildTarget(), 'scheduled');

    expect(hooks.map((hook) => hook.method)).toEqual([
      'baseSetup',
      'childSetup',
      'afterChild',
    ]);
  });

  test('a base instance only sees its own declarations', () => {
    const hooks = resolveLifecycleHooks(new BaseTarget(), 'scheduled');

    expect(hooks.map((hook) => hook.method)).toEqual(['baseSetup']);
  });

  test('phases without declarations resolve to nothing', () => {
    expect(resolveLifecycleHooks(new ChildTarget(), 'shutdown')).toEqual([]);
    expect(resolveLifecycleHooks({}, 'added')).toEqual([]);
  });

  test('later declarations are picked up and duplicates collapse', () => {
    class Late {
      public first(): void {}
      public second(): void {}
    }

    declareLifecycleHooks(Late, { added: [{ method: 'first' }] });
    expect(resolveLifecycleHooks(new Late(), 'added')).toHaveLength(1);

    declareLifecycleHooks(Late, {
      added: [{ method: 'second' }, { method: 'first' }],
    });

    expect(
      resolveLifecycleHooks(new Late(), 'added').map((hook) => hook.method),
    ).toEqual(['first', 'second']);
  });
});

describe('describeTarget', () => {
  test('prefers getName, then getIdentifier, then the class name', () => {
    class Anonymous {}

    expect(describeTarget(new ChildTarget())).toBe('child-target');
    expect(describeTarget({ getIdentifier: () => 'svc-1' })).toBe('svc-1');
    expect(describeTarget(new Anonymous())).toBe('Anonymous');
  });
});

describe('LifecycleInvoker', () => {
  const invoker = new LifecycleInvoker();

  test('awaits hooks in order and passes matching arguments', async () => {
    const target = new ChildTarget();

    const invoked = await invoker.invoke('scheduled', target, processContext);

    expect(invoked).toEqual(['baseSetup', 'childSetup', 'afterChild']);
    expect(target.calls).toEqual(['baseSetup', 'childSetup', 'afterChild']);
    expect(target.received).toEqual([[], [processContext]]);
  });

  test('matches arguments by kind, not by position', async () => {
    const target = new ChildTarget();

    await invoker.invoke('enabled', target, processContext, configurationContext);

    expect(target.received).toEqual([[configurationContext, processContext]]);
  });

  test('fails when a declared argument kind is missing', async () => {
    const target = new ChildTarget();

    const promise = invoker.invoke('scheduled', target);

    await expect(promise).rejects.toThrow(LifecycleInvocationError);
    await expect(promise).rejects.toThrow(
      'Lifecycle hook child-target.childSetup failed during "scheduled" (no process-context argument supplied)',
    );
    expect(target.calls).toEqual(['baseSetup']);
  });

  test('stops at the first failing hook and keeps the cause', async () => {
    const target = new ChildTarget();

    const error = await invoker.invoke('stopped', target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LifecycleInvocationError);

    if (error instanceof LifecycleInvocationError) {
      expect(error.additionalInfo).toEqual({
        phase: 'stopped',
        targetName: 'child-target',
        methodName: 'explode',
        reason: undefined,
      });
      expect(error.cause).toBeInstanceOf(Error);
      expect(error.message).toBe(
        'Lifecycle hook child-target.explode failed during "stopped": hook exploded',
      );
    }

    expect(target.calls).toEqual([]);
  });

  test('fails when the declared method is not a function', async () => {
    class Broken {
      public real(): void {}
    }

    declareLifecycleHooks(Broken, { removed: [{ method: 'real' }] });
    const target = new Broken();
    Object.defineProperty(target, 'real', { value: 'oops' });

    await expect(invoker.invoke('removed', target)).rejects.toThrow(
      'Lifecycle hook Broken.real failed during "removed" (method is not a function)',
    );
  });

  test('rejected async hooks surface as invocation errors', async () => {
    class AsyncFailure {
      public async boom(): Promise<void> {
        await sleep(1);
        throw new Error('async boom');
      }
    }

    declareLifecycleHooks(AsyncFailure, { disabled: [{ method: 'boom' }] });

    await expect(
      invoker.invoke('disabled', new AsyncFailure()),
    ).rejects.toThrow('Lifecycle hook AsyncFailure.boom failed during "disabled": async boom');
  });
});
