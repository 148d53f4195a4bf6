import type { z } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class UnknownPresetError extends Error {
  constructor(
    public readonly preset: string,
    public readonly available: string[]
  ) {
    super(`Unknown preset '${preset}'. Available: ${available.join(', ')}`);
    this.name = 'UnknownPresetError';
  }
}

/**
 * A strategy update or replacement that does not validate.
 * The store is left unchanged.
 */
export class StrategyValidationError extends Error {
  constructor(
    public readonly kind: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(
      `Invalid ${kind} strategy: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`
    );
    this.name = 'StrategyValidationError';
  }

  static fromZod(kind: string, error: z.ZodError): StrategyValidationError {
    return new StrategyValidationError(
      kind,
      error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message
      }))
    );
  }
}
