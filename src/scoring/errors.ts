export type EngineInputErrorCode =
  | 'series_not_array'
  | 'auxiliary_not_object'
  | 'current_month_out_of_range';

/**
 * Raised only for call shapes no collaborator should ever produce.
 * Malformed samples are normalized instead.
 */
export class EngineInputError extends Error {
  constructor(
    message: string,
    public code: EngineInputErrorCode
  ) {
    super(message);
    this.name = 'EngineInputError';
  }
}
