/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Default values
 * - Error messages that name the offending flag or argument
 */

import { z } from 'zod';
import { InvalidInputError, ValidationError } from '../errors/index.js';
import type { ListFlags } from '../output/index.js';

// ============================================================================
// ARGUMENTS
// ============================================================================

const IdSchema = z.coerce.number().int().positive();

/**
 * Parse a record ID argument.
 *
 * @throws InvalidInputError naming the argument, e.g. `invalid employee ID: abc`
 */
export function parseId(value: string, label = 'ID'): number {
  const result = IdSchema.safeParse(value.trim() === '' ? Number.NaN : value);
  if (!result.success) {
    throw new InvalidInputError(`invalid ${label}: ${value}`, 'IDs are positive whole numbers');
  }
  return result.data;
}

export const ResourceNameSchema = z
  .string()
  .regex(/^[A-Z][A-Za-z0-9]*$/, 'Resource names are PascalCase, e.g. Employee or OperationalUnit');

/**
 * Parse a resource name argument (`Employee`, `OperationalUnit`, ...).
 */
export function parseResourceName(value: string): string {
  const result = ResourceNameSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(
      `invalid resource name: ${value}`,
      "Resource names are PascalCase; run 'deputy resource list' for known names"
    );
  }
  return result.data;
}

/** Rejects dates that roll over, such as 2025-02-30 */
function isCalendarDate(value: string): boolean {
  const time = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

export const DateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine(isCalendarDate);

/**
 * Parse a `YYYY-MM-DD` flag value.
 */
export function parseDate(value: string, flag: string): string {
  const result = DateSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`invalid ${flag} date "${value}" (expected YYYY-MM-DD)`);
  }
  return result.data;
}

// ============================================================================
// FLAG PARSERS (commander argParser callbacks)
// ============================================================================

const CountSchema = z.coerce.number().int().nonnegative();

/**
 * Build a commander argument parser for a non-negative integer flag.
 */
export function countParser(flag: string): (value: string) => number {
  return (value: string) => {
    const result = CountSchema.safeParse(value.trim() === '' ? Number.NaN : value);
    if (!result.success) {
      throw new InvalidInputError(`invalid ${flag} "${value}" (expected a non-negative integer)`);
    }
    return result.data;
  };
}

/**
 * Build a commander argument parser for an ID flag such as `--employee`.
 */
export function idParser(label: string): (value: string) => number {
  return (value: string) => parseId(value, label);
}

// ============================================================================
// LIST FLAGS
// ============================================================================

export const ListFlagsSchema = z.object({
  limit: z.number().int().nonnegative().default(0),
  offset: z.number().int().nonnegative().default(0),
  failEmpty: z.boolean().default(false),
});

/**
 * Validate the `--limit`, `--offset` and `--fail-empty` options of a command.
 */
export function parseListFlags(options: unknown): ListFlags {
  return validateInput(ListFlagsSchema, options, 'invalid list flags');
}

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @throws ValidationError listing every issue (`path: message`)
 *
 * @example
 * ```typescript
 * const flags = validateInput(ListFlagsSchema, command.opts(), 'invalid list flags');
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  throw new ValidationError(message, issues);
}
