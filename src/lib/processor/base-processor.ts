import { KEBAB_CASE_PATTERN } from '../constants';
import { InvalidNameError } from '../errors';
import type { LoggerService } from '../logger';
import type { PropertyDescriptor } from '../properties/property-descriptor';
import type { MockValidationContext } from '../properties/property-context';
import type { Relationship } from '../properties/relationship';
import type { ValidationResult } from '../properties/validation';
import type { ControllerServiceLookup } from '../services/types';
import type {
  ProcessContext,
  ProcessSession,
  Processor,
  ProcessorInitializationContext,
  SessionFactory,
} from './types';

export interface BaseProcessorOptions {
  /** kebab-case, e.g. 'split-text' */
  name: string;
  triggerSerially?: boolean;
}

/**
 * Base class for processors that work one session per trigger.
 *
 * `onTrigger` opens a session, runs `onTriggerSession`, and commits. When
 * anything throws, the session is rolled back with penalization and the
 * error is rethrown.
 *
 * @example
 * ```typescript
 * class Uppercase extends BaseProcessor {
 *   constructor() {
 *     super({ name: 'uppercase' });
 *   }
 *
 *   public getRelationships() {
 *     return [REL_SUCCESS];
 *   }
 *
 *   protected onTriggerSession(context: ProcessContext, session: ProcessSession) {
 *     const flowFile = session.get();
 *     if (!flowFile) return;
 *     session.transfer(
 *       session.write(flowFile, (content) => content.toString().toUpperCase()),
 *       REL_SUCCESS,
 *     );
 *   }
 * }
 * ```
 */
export abstract class BaseProcessor implements Processor {
  public readonly triggerSerially: boolean;
  protected readonly name: string;

  /** Set by initialize() */
  protected logger!: LoggerService;
  protected lookup!: ControllerServiceLookup;
  private identifier?: string;

  /**
   * @throws {InvalidNameError} If the name isn't kebab-case
   */
  constructor(options: BaseProcessorOptions) {
    if (!KEBAB_CASE_PATTERN.test(options.name)) {
      throw new InvalidNameError({ name: options.name, kind: 'processor' });
    }

    this.name = options.name;
    this.triggerSerially = options.triggerSerially ?? false;
  }

  public getName(): string {
    return this.name;
  }

  public getIdentifier(): string | undefined {
    return this.identifier;
  }

  public initialize(context: ProcessorInitializationContext): void {
    this.identifier = context.identifier;
    this.logger = context.logger;
    this.lookup = context.lookup;
    this.init(context);
  }

  public abstract getRelationships(): readonly Relationship[];

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return [];
  }

  public getPropertyDescriptor(name: string): PropertyDescriptor | undefined {
    return this.getPropertyDescriptors().find(
      (descriptor) => descriptor.name === name,
    );
  }

  public customValidate(_context: MockValidationContext): ValidationResult[] {
    return [];
  }

  public async onTrigger(
    context: ProcessContext,
    sessionFactory: SessionFactory,
  ): Promise<void> {
    const session = sessionFactory.createSession();

    try {
      await this.onTriggerSession(context, session);
      session.commit();
    } catch (error) {
      session.rollback(true);
      throw error;
    }
  }

  protected abstract onTriggerSession(
    context: ProcessContext,
    session: ProcessSession,
  ): void | Promise<void>;

  /**
   * Runs at the end of initialize()
   */
  protected init(_context: ProcessorInitializationContext): void {}
}
