/**
 * Caller and time of the transaction being executed.
 * Passed explicitly to every operation: nothing in the engine reads the wall clock.
 */
export interface ExecutionContext {
  callerId: string;
  timestamp: number; // unix seconds
}

export function NewContext(callerId: string, timestamp: number): ExecutionContext {
  return { callerId, timestamp };
}
