import { Checkpointable } from '../model/Checkpoint';
import { InvariantViolationError } from '../utils/Errors';
import { SerializeState } from '../utils/Utils';

interface RegisteredComponent {
  name: string;
  capture: () => () => void;
  read: () => unknown;
}

/**
 * Whole-engine checkpoint: one restore thunk per registered component
 */
export interface EngineCheckpoint {
  restorers: (() => void)[];
}

export class StateCheckpointer {
  private components: RegisteredComponent[] = [];

  register<S>(name: string, component: Checkpointable<S>) {
    if (this.components.some((_) => _.name == name)) {
      throw new InvariantViolationError(`component ${name} registered twice`);
    }

    this.components.push({
      name,
      capture: () => {
        const state = component.snapshot();
        return () => component.restore(state);
      },
      read: () => component.snapshot()
    });
  }

  capture(): EngineCheckpoint {
    return { restorers: this.components.map((_) => _.capture()) };
  }

  restore(checkpoint: EngineCheckpoint) {
    for (const restorer of checkpoint.restorers) {
      restorer();
    }
  }

  /**
   * Serialized state of every component. Equal fingerprints mean identical state.
   */
  fingerprint(): string {
    const states: { [name: string]: unknown } = {};
    for (const component of this.components) {
      states[component.name] = component.read();
    }
    return SerializeState(states);
  }

  getComponentNames(): string[] {
    return this.components.map((_) => _.name);
  }
}
