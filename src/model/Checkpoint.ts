/**
 * A component whose whole mutable state can be captured and put back.
 * snapshot() returns a deep copy; restore() must not keep a reference to its argument.
 */
export interface Checkpointable<S> {
  snapshot(): S;
  restore(state: S): void;
}
