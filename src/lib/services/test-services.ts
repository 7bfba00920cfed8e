import { z } from 'zod';
import { declareLifecycleHooks } from '../lifecycle/lifecycle-invoker';
import type { ServicePhase } from '../lifecycle/phases';
import { definePropertyDescriptor } from '../properties/property-descriptor';
import type { PropertyDescriptor } from '../properties/property-descriptor';
import type { MockConfigurationContext } from '../properties/property-context';
import { BaseControllerService } from './base-controller-service';

export const PREFIX = definePropertyDescriptor({
  name: 'record-prefix',
  displayName: 'Record Prefix',
  required: true,
  schema: z.string().min(2, 'must be at least 2 characters'),
});

export const MODE = definePropertyDescriptor({
  name: 'mode',
  allowableValues: ['fast', 'safe'],
  defaultValue: 'safe',
});

const RECORDING_DESCRIPTORS: readonly PropertyDescriptor[] = [PREFIX, MODE];

/**
 * Records every lifecycle hook it sees; `failOn` makes a hook throw instead.
 */
export class RecordingService extends BaseControllerService {
  public readonly events: string[] = [];
  public readonly failOn = new Set<ServicePhase>();
  public enabledMode?: string;

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return RECORDING_DESCRIPTORS;
  }

  public onAdded(): void {
    this.record('added');
  }

  public onEnabled(context: MockConfigurationContext): void {
    this.record('enabled');
    this.enabledMode = context.getProperty(MODE).getValue();
  }

  public onDisabled(): void {
    this.record('disabled');
  }

  public async onRemoved(): Promise<void> {
    await Promise.resolve();
    this.record('removed');
  }

  private record(phase: ServicePhase): void {
    if (this.failOn.has(phase)) {
      throw new Error(`${phase} hook failed`);
    }

    this.events.push(phase);
  }
}

declareLifecycleHooks(RecordingService, {
  added: [{ method: 'onAdded' }],
  enabled: [{ method: 'onEnabled', parameters: ['configuration-context'] }],
  disabled: [{ method: 'onDisabled' }],
  removed: [{ method: 'onRemoved' }],
});

export const ENTRIES = definePropertyDescriptor({
  name: 'entries',
  description: 'Comma separated key=value pairs',
  required: true,
  schema: z
    .string()
    .regex(/^[^=,]+=[^=,]*(,[^=,]+=[^=,]*)*$/, 'must be key=value pairs'),
});

/**
 * In-memory key/value lookup loaded from the `entries` property when enabled
 */
export class KeyValueLookupService extends BaseControllerService {
  private entries = new Map<string, string>();

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return [ENTRIES];
  }

  public load(context: MockConfigurationContext): void {
    const raw = context.getProperty(ENTRIES).getValue() ?? '';

    this.entries = new Map(
      raw
        .split(',')
        .filter((pair) => pair.length > 0)
        .map((pair): [string, string] => {
          const [key = '', value = ''] = pair.split('=');
          return [key.trim(), value.trim()];
        }),
    );

    this.logger.debug('Loaded {{count}} entries', {
      params: { count: this.entries.size },
    });
  }

  public clear(): void {
    this.entries.clear();
  }

  public lookup(key: string): string | undefined {
    return this.entries.get(key);
  }
}

declareLifecycleHooks(KeyValueLookupService, {
  enabled: [{ method: 'load', parameters: ['configuration-context'] }],
  disabled: [{ method: 'clear' }],
});

export function isKeyValueLookupService(
  service: unknown,
): service is KeyValueLookupService {
  return service instanceof KeyValueLookupService;
}
