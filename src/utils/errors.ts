export type AnalyticsErrorType = 'malformed_input' | 'configuration'

export type MalformedInputInvariant =
  | 'invalid_dream_id'
  | 'duplicate_dream_id'
  | 'invalid_created_at'
  | 'dream_sign_without_lucid'
  | 'lucid_without_dream_sign'
  | 'invalid_log_date'
  | 'duplicate_log_date'
  | 'invalid_sleep_time'
  | 'quality_out_of_range'
  | 'negative_reality_checks'
  | 'invalid_technique_practice'

export type ConfigurationInvariant = 'invalid_top_n' | 'invalid_calendar_month' | 'invalid_reference_date'

export class AnalyticsError extends Error {
  readonly type: AnalyticsErrorType
  readonly invariant: MalformedInputInvariant | ConfigurationInvariant
  readonly subject?: string | number

  constructor(
    type: AnalyticsErrorType,
    invariant: MalformedInputInvariant | ConfigurationInvariant,
    message: string,
    subject?: string | number,
  ) {
    super(message)
    this.name = 'AnalyticsError'
    this.type = type
    this.invariant = invariant
    this.subject = subject
  }
}

export function malformedInput(
  invariant: MalformedInputInvariant,
  message: string,
  subject?: string | number,
): AnalyticsError {
  return new AnalyticsError('malformed_input', invariant, message, subject)
}

export function configurationError(invariant: ConfigurationInvariant, message: string): AnalyticsError {
  return new AnalyticsError('configuration', invariant, message)
}

export function isAnalyticsError(error: unknown): error is AnalyticsError {
  return error instanceof AnalyticsError
}

export function toErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message
  }
  return fallback
}
