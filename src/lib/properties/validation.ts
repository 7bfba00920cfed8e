export interface ValidationResult {
  /** Property display name, or whatever else was validated */
  readonly subject: string;
  readonly input?: string;
  readonly valid: boolean;
  readonly explanation?: string;
}

export function validResult(subject: string, input?: string): ValidationResult {
  return { subject, input, valid: true };
}

export function invalidResult(
  subject: string,
  input: string | undefined,
  explanation: string,
): ValidationResult {
  return { subject, input, valid: false, explanation };
}

export function formatValidationResult(result: ValidationResult): string {
  const input = result.input === undefined ? '' : ` with value "${result.input}"`;

  if (result.valid) {
    return `"${result.subject}"${input} is valid`;
  }

  return `"${result.subject}"${input} is invalid: ${result.explanation ?? 'no explanation given'}`;
}

export function invalidResults(
  results: readonly ValidationResult[],
): ValidationResult[] {
  return results.filter((result) => !result.valid);
}
