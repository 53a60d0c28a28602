import fs from 'fs';
import { EngineStateFileStructure } from '../../model/EngineState';
import { LendingEngine } from '../../LendingEngine';
import { ENGINE_STATE_FILE } from '../../utils/Constants';
import { ConfigurationError } from '../../utils/Errors';
import { Log } from '../../utils/Logger';
import { ReadJSON, WriteJSON } from '../../utils/Utils';

export function SaveEngineState(engine: LendingEngine, filename = ENGINE_STATE_FILE) {
  const fileData: EngineStateFileStructure = {
    updated: Date.now(),
    updatedHuman: new Date(Date.now()).toISOString(),
    state: engine.exportState()
  };

  WriteJSON(filename, fileData);
  Log(`SaveEngineState: engine state saved to ${filename}`);
}

/**
 * Load a saved state into `engine`. The engine must have been built from the same configuration.
 * Returns false when the file does not exist.
 */
export function LoadEngineState(engine: LendingEngine, filename = ENGINE_STATE_FILE): boolean {
  if (!fs.existsSync(filename)) {
    Log(`LoadEngineState: no state file at ${filename}`);
    return false;
  }

  const fileData: EngineStateFileStructure = ReadJSON(filename);
  if (!fileData.state || !fileData.state.ledger || !fileData.state.lendingPool) {
    throw new ConfigurationError(`${filename} is not an engine state file`);
  }

  engine.importState(fileData.state);
  Log(`LoadEngineState: engine state loaded from ${filename}, saved ${fileData.updatedHuman}`);
  return true;
}
