/**
 * How serious a failure is, from purely informational to user-blocking
 */
export type ErrorSeverity = 'systemInfo' | 'warning' | 'severe' | 'danger';

export const ERROR_SEVERITIES: readonly ErrorSeverity[] = [
  'systemInfo',
  'warning',
  'severe',
  'danger',
];

/**
 * Uniform failure representation carried by every failed {@link Result}.
 *
 * Structured errors are plain, immutable data so they can be logged,
 * compared and sent over the wire without losing information.
 */
export interface StructuredError {
  /** Short human-readable title */
  readonly title: string;
  /** Stable machine-readable code (e.g. `DB_NOT_FOUND`) */
  readonly code: string;
  /** Longer explanation of what went wrong */
  readonly description: string;
  readonly severity: ErrorSeverity;
  /** Free-form context: where it happened, which key, the source system */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Parse a severity name, falling back to `systemInfo` for anything unknown.
 */
export function parseSeverity(value: unknown): ErrorSeverity {
  return ERROR_SEVERITIES.find((severity) => severity === value) ?? 'systemInfo';
}

/**
 * Copy a structured error with extra metadata merged in.
 */
export function withMetadata(
  error: StructuredError,
  metadata: Record<string, unknown>
): StructuredError {
  return Object.freeze({ ...error, metadata: Object.freeze({ ...error.metadata, ...metadata }) });
}

/**
 * Render a structured error on a single line, e.g. for log output.
 */
export function formatStructuredError(error: StructuredError): string {
  const meta =
    Object.keys(error.metadata).length > 0 ? ` | Meta: ${JSON.stringify(error.metadata)}` : '';
  return `${error.title} (${error.code}): ${error.description}${meta} | Level: ${error.severity}`;
}
