import { z } from 'zod';
import { KEBAB_CASE_PATTERN } from '../constants';
import { HarnessConfigurationError } from '../errors';
import { generateID } from '../id-helpers';
import { Logger } from '../logger';

export const TRIGGER_FAILURE_MODES = ['first', 'aggregate'] as const;

export type TriggerFailureMode = (typeof TRIGGER_FAILURE_MODES)[number];

export const harnessOptionsSchema = z.object({
  name: z
    .string()
    .regex(KEBAB_CASE_PATTERN, 'must be kebab-case')
    .default('processor-harness'),
  threadCount: z.number().int().min(1).default(1),
  /**
   * `first`: raise the first failed trigger and log the others.
   * `aggregate`: raise every failure together.
   */
  triggerFailureMode: z.enum(TRIGGER_FAILURE_MODES).default('first'),
  validateBeforeRun: z.boolean().default(true),
  identifier: z.string().min(1).optional(),
});

export interface HarnessOptions extends z.input<typeof harnessOptionsSchema> {
  /** Defaults to a test-optimized logger writing to an ArraySink */
  logger?: Logger;
}

export interface ResolvedHarnessOptions
  extends Omit<z.output<typeof harnessOptionsSchema>, 'identifier'> {
  identifier: string;
  logger: Logger;
}

/**
 * @throws {HarnessConfigurationError} Listing every zod issue
 */
export function resolveHarnessOptions(
  options: HarnessOptions = {},
): ResolvedHarnessOptions {
  const { logger, ...rest } = options;
  const parsed = harnessOptionsSchema.safeParse(rest);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );

    throw new HarnessConfigurationError(
      `Invalid harness options: ${issues.join('; ')}`,
      { issues },
    );
  }

  return {
    ...parsed.data,
    identifier: parsed.data.identifier ?? generateID('uuid4'),
    logger: logger ?? Logger.createTestOptimizedLogger().logger,
  };
}
