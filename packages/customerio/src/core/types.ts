// Data passed between the dispatcher and the pure classification functions

/**
 * What the transport produced for one dispatched request: either a complete
 * HTTP response (any status) or a failure before any response existed.
 */
export type TransportOutcome =
  | { error: Error; type: 'failure' }
  | { body: string; status: number; statusText: string; type: 'response' };
