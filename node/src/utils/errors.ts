export interface ValidationIssue {
  path: string;
  message: string;
}

/** Input that can never produce an itinerary. Raised before any retrieval; maps to HTTP 400. */
export class ItineraryValidationError extends Error {
  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
    this.name = 'ItineraryValidationError';
  }
}
