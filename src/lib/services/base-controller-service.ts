import type { LoggerService } from '../logger';
import type { PropertyDescriptor } from '../properties/property-descriptor';
import type { MockValidationContext } from '../properties/property-context';
import { validateConfiguredProperties } from '../properties/configured-properties';
import type { ValidationResult } from '../properties/validation';
import type {
  ControllerService,
  ControllerServiceInitializationContext,
  ControllerServiceLookup,
} from './types';

/**
 * Convenience base for controller services: keeps the identifier, logger and
 * lookup from `initialize`, and validates configured values against
 * `getPropertyDescriptors()`.
 *
 * @example
 * ```typescript
 * class CountryLookup extends BaseControllerService {
 *   public getPropertyDescriptors() {
 *     return [REGION];
 *   }
 *
 *   public onEnabled(context: MockConfigurationContext) {
 *     this.region = context.getProperty(REGION).getValue();
 *   }
 * }
 *
 * declareLifecycleHooks(CountryLookup, {
 *   enabled: [{ method: 'onEnabled', parameters: ['configuration-context'] }],
 * });
 * ```
 */
export abstract class BaseControllerService implements ControllerService {
  /** Set by initialize() */
  protected logger!: LoggerService;
  protected lookup!: ControllerServiceLookup;
  private identifier?: string;

  public initialize(context: ControllerServiceInitializationContext): void {
    this.identifier = context.identifier;
    this.logger = context.logger;
    this.lookup = context.lookup;
    this.init(context);
  }

  public getIdentifier(): string {
    return this.identifier ?? this.constructor.name;
  }

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return [];
  }

  public getPropertyDescriptor(name: string): PropertyDescriptor | undefined {
    return this.getPropertyDescriptors().find(
      (descriptor) => descriptor.name === name,
    );
  }

  public validate(context: MockValidationContext): ValidationResult[] {
    return [
      ...validateConfiguredProperties(
        this.getPropertyDescriptors(),
        context.getConfiguredValues(),
        this.getIdentifier(),
      ),
      ...this.customValidate(context),
    ];
  }

  /**
   * Subclass hook run at the end of initialize()
   */
  protected init(_context: ControllerServiceInitializationContext): void {}

  /**
   * Extra cross-property checks
   */
  protected customValidate(_context: MockValidationContext): ValidationResult[] {
    return [];
  }
}
