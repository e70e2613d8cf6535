import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Renders a Standard Schema issue path as a dotted string.
 *
 * Path segments are either bare property keys or `{ key }` objects; both
 * collapse to their key. An absent or empty path is reported as `(root)`.
 */
function formatIssuePath(issue: StandardSchemaV1.Issue): string {
  const segments = issue.path ?? [];
  if (segments.length === 0) return '(root)';

  return segments
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}

/**
 * Validates (and applies defaults to) configuration through a Standard
 * Schema V1 compliant validator.
 *
 * The `~standard` property is the universal adapter: any library implementing
 * it (zod, valibot, arktype...) is accepted, and its result object is checked
 * instead of relying on library-specific throwing `.parse` methods.
 *
 * @param schema - The schema instance.
 * @param input - The raw configuration object.
 * @param context - What is being configured (used for error reporting).
 * @returns The validated output, with schema defaults applied.
 *
 * @throws
 * - If the validator returns a Promise (configuration is validated synchronously).
 * - If validation fails; the first issue's path and message are reported.
 */

/**
 * Public Overload:
 * Binds the return type to the schema's declared output.
 *
 * Implementation Note - Overloads:
 * Inside the body the schema is only known as `StandardSchemaV1`, so the
 * validated value is `unknown`. The overload ties it back to
 * `InferOutput<S>` without a type assertion on the return statement.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  context: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  context: string
) {
  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new Error(
      `[callcheck] Async schema validation is not supported for ${context}.`
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    throw new Error(
      `[callcheck] Invalid ${context} at "${formatIssuePath(firstIssue)}": ${firstIssue.message}`
    );
  }

  // A result without issues is the success branch and carries `value`.
  return 'value' in result ? result.value : input;
}
