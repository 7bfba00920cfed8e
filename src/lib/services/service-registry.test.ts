import { beforeEach, describe, expect, test } from 'vitest';
import {
  LifecycleInvocationError,
  ServiceRegistrationError,
  ServiceStateError,
  UnknownPropertyError,
  UnknownServiceError,
} from '../errors';
import { Logger } from '../logger';
import type { ArraySink } from '../logger';
import { ServiceRegistry } from './service-registry';
import {
  KeyValueLookupService,
  MODE,
  PREFIX,
  RecordingService,
} from './test-services';

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry;
  let arraySink: ArraySink;
  let service: RecordingService;

  beforeEach(() => {
    const created = Logger.createTestOptimizedLogger();
    arraySink = created.arraySink;
    registry = new ServiceRegistry({ logger: created.logger });
    service = new RecordingService();
  });

  describe('add', () => {
    test('initializes, fires added and stores the service disabled', async () => {
      await registry.add('recorder', service, { 'record-prefix': 'rx' });

      expect(service.events).toEqual(['added']);
      expect(service.getIdentifier()).toBe('recorder');
      expect(registry.has('recorder')).toBe(true);
      expect(registry.isEnabled('recorder')).toBe(false);
      expect(registry.getProperties('recorder')).toEqual(
        new Map([['record-prefix', 'rx']]),
      );
      expect(arraySink.getMessages('info')).toEqual([
        'Added controller service recorder',
      ]);
    });

    test('rejects a duplicate identifier', async () => {
      await registry.add('recorder', service);

      await expect(
        registry.add('recorder', new RecordingService()),
      ).rejects.toThrow(ServiceRegistrationError);
    });

    test('rejects unknown initial properties and stores nothing', async () => {
      await expect(
        registry.add('recorder', service, { nope: '1' }),
      ).rejects.toThrow(UnknownPropertyError);

      expect(registry.has('recorder')).toBe(false);
      expect(service.events).toEqual([]);
    });

    test('a failing added hook stores nothing', async () => {
      service.failOn.add('added');

      await expect(registry.add('recorder', service)).rejects.toThrow(
        LifecycleInvocationError,
      );
      expect(registry.has('recorder')).toBe(false);
    });
  });

  describe('state machine', () => {
    beforeEach(async () => {
      await registry.add('recorder', service, { 'record-prefix': 'rx' });
    });

    test('add, enable, disable, remove runs every hook in order', async () => {
      await registry.enable('recorder');
      expect(registry.isEnabled('recorder')).toBe(true);

      await registry.disable('recorder');
      expect(registry.isEnabled('recorder')).toBe(false);

      await registry.remove('recorder');

      expect(service.events).toEqual(['added', 'enabled', 'disabled', 'removed']);
      expect(registry.has('recorder')).toBe(false);
      expect(registry.getIdentifiers()).toEqual([]);
    });

    test('enable hands the hook the configured values with defaults', async () => {
      await registry.enable('recorder');

      expect(service.enabledMode).toBe('safe');
    });

    test('enabling twice fails', async () => {
      await registry.enable('recorder');

      await expect(registry.enable('recorder')).rejects.toThrow(
        'Cannot enable controller service "recorder" while it is enabled',
      );
    });

    test('disabling a disabled service fails', async () => {
      await expect(registry.disable('recorder')).rejects.toThrow(
        ServiceStateError,
      );
    });

    test('a failing enabled hook leaves the service disabled', async () => {
      service.failOn.add('enabled');

      await expect(registry.enable('recorder')).rejects.toThrow(
        LifecycleInvocationError,
      );
      expect(registry.isEnabled('recorder')).toBe(false);
    });

    test('a failing disabled hook still disables, then raises', async () => {
      await registry.enable('recorder');
      service.failOn.add('disabled');

      await expect(registry.disable('recorder')).rejects.toThrow(
        'Lifecycle hook recorder.onDisabled failed during "disabled": disabled hook failed',
      );
      expect(registry.isEnabled('recorder')).toBe(false);
    });

    test('removing an enabled service fails and keeps it', async () => {
      await registry.enable('recorder');

      await expect(registry.remove('recorder')).rejects.toThrow(
        'Cannot remove controller service "recorder" while it is enabled',
      );
      expect(registry.has('recorder')).toBe(true);
    });

    test('a failing removed hook keeps the registration', async () => {
      service.failOn.add('removed');

      await expect(registry.remove('recorder')).rejects.toThrow(
        LifecycleInvocationError,
      );
      expect(registry.has('recorder')).toBe(true);
    });

    test('re-adding after remove works', async () => {
      await registry.remove('recorder');

      await registry.add('recorder', new RecordingService());

      expect(registry.has('recorder')).toBe(true);
    });
  });

  describe('configuration', () => {
    beforeEach(async () => {
      await registry.add('recorder', service);
    });

    test('setProperty stores the value and returns its validation', () => {
      const result = registry.setProperty('recorder', PREFIX, 'x');

      expect(result).toEqual({
        subject: 'Record Prefix',
        input: 'x',
        valid: false,
        explanation: 'must be at least 2 characters',
      });
      expect(registry.getProperty('recorder', 'record-prefix')).toBe('x');
    });

    test('setProperty by name resolves the descriptor', () => {
      const result = registry.setProperty('recorder', 'mode', 'fast');

      expect(result.valid).toBe(true);
      expect(registry.getProperty('recorder', MODE)).toBe('fast');
    });

    test('unknown property names return an invalid result and store nothing', () => {
      const result = registry.setProperty('recorder', 'colour', 'blue');

      expect(result).toEqual({
        subject: 'Invalid property',
        input: 'colour',
        valid: false,
        explanation: 'colour is not a known property of recorder',
      });
      expect(registry.getProperties('recorder').size).toBe(0);
    });

    test('getProperty falls back to the default', () => {
      expect(registry.getProperty('recorder', MODE)).toBe('safe');
    });

    test('removeProperty reports whether a value was configured', () => {
      registry.setProperty('recorder', MODE, 'fast');

      expect(registry.removeProperty('recorder', MODE)).toBe(true);
      expect(registry.removeProperty('recorder', MODE)).toBe(false);
    });

    test('configuration is rejected while enabled', async () => {
      await registry.enable('recorder');

      expect(() => registry.setProperty('recorder', MODE, 'fast')).toThrow(
        ServiceStateError,
      );
      expect(() => registry.removeProperty('recorder', MODE)).toThrow(
        ServiceStateError,
      );
      expect(() => registry.setAnnotationData('recorder', '<x/>')).toThrow(
        ServiceStateError,
      );
    });

    test('annotation data is stored while disabled', () => {
      registry.setAnnotationData('recorder', '<config/>');

      expect(registry.getAnnotationData('recorder')).toBe('<config/>');
    });

    test('validate reports missing required properties', () => {
      const results = registry.validate('recorder');

      expect(results.filter((result) => !result.valid)).toEqual([
        {
          subject: 'Record Prefix',
          input: undefined,
          valid: false,
          explanation: 'Record Prefix is required',
        },
      ]);
    });
  });

  describe('overlapping operations', () => {
    test('a second add of an identifier still being added is rejected', async () => {
      const second = new RecordingService();

      const results = await Promise.allSettled([
        registry.add('svc', service),
        registry.add('svc', second),
      ]);

      expect(results.map((result) => result.status)).toEqual([
        'fulfilled',
        'rejected',
      ]);

      const [, rejected] = results;
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(
        ServiceRegistrationError,
      );
      expect(registry.getService('svc')).toBe(service);
      expect(second.events).toEqual([]);
    });

    test('enabled fires once when enable overlaps itself', async () => {
      await registry.add('svc', service);

      const results = await Promise.allSettled([
        registry.enable('svc'),
        registry.enable('svc'),
      ]);

      expect(results.map((result) => result.status)).toEqual([
        'fulfilled',
        'rejected',
      ]);

      const [, rejected] = results;
      expect(
        rejected?.status === 'rejected' &&
          rejected.reason instanceof ServiceStateError &&
          rejected.reason.message,
      ).toBe('Cannot enable controller service "svc" while enable is in progress');
      expect(service.events).toEqual(['added', 'enabled']);
      expect(registry.isEnabled('svc')).toBe(true);
    });

    test('configuration is locked while a transition runs', async () => {
      await registry.add('svc', service);

      const removing = registry.remove('svc');

      expect(() => registry.setProperty('svc', MODE, 'fast')).toThrow(
        'Cannot setProperty controller service "svc" while remove is in progress',
      );

      await removing;

      expect(registry.has('svc')).toBe(false);
    });

    test('a failed transition releases the identifier', async () => {
      await registry.add('svc', service);
      service.failOn.add('enabled');

      await expect(registry.enable('svc')).rejects.toThrow(
        LifecycleInvocationError,
      );

      service.failOn.clear();
      await registry.enable('svc');

      expect(registry.isEnabled('svc')).toBe(true);
      expect(service.events).toEqual(['added', 'enabled']);
    });
  });

  describe('queries', () => {
    test('unknown identifiers raise UnknownServiceError', () => {
      expect(() => registry.isEnabled('missing')).toThrow(UnknownServiceError);
      expect(() => registry.getService('missing')).toThrow(UnknownServiceError);
      expect(() => registry.getProperties('missing')).toThrow(UnknownServiceError);
      expect(registry.has('missing')).toBe(false);
    });

    test('unknown identifiers reject for async operations', async () => {
      await expect(registry.enable('missing')).rejects.toThrow(
        'No controller service registered as "missing"',
      );
    });

    test('lookup methods answer for unknown identifiers without throwing', () => {
      expect(registry.getControllerService('missing')).toBeUndefined();
      expect(registry.isControllerServiceEnabled('missing')).toBe(false);
    });

    test('services can be looked up once enabled', async () => {
      const lookup = new KeyValueLookupService();
      await registry.add('countries', lookup, { entries: 'nl=Netherlands,de=Germany' });
      await registry.enable('countries');

      expect(registry.getService('countries')).toBe(lookup);
      expect(registry.isControllerServiceEnabled('countries')).toBe(true);
      expect(registry.getControllerServiceIdentifiers()).toEqual(['countries']);
      expect(lookup.lookup('de')).toBe('Germany');
    });
  });
});
